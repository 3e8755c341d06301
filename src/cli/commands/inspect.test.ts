import { describe, it, expect } from 'vitest';
import { inspectLedger } from './inspect.js';
import { DegradationLevel } from '../../provenance/types.js';

const ledger = {
  observations: {
    aaaa1111: {
      id: 'aaaa1111',
      content: 'port=8080',
      source_type: 'TOOL_RETURN',
      source_id: 'read_file',
      timestamp: '2026-01-01T00:00:00.000Z',
      confidence: 1,
      scope: 'file:/srv/app/notes.txt',
      ttl_seconds: null,
      metadata: {}
    },
    bbbb2222: {
      id: 'bbbb2222',
      content: 'Status page says all systems operational',
      source_type: 'TOOL_RETURN',
      source_id: 'read_url',
      timestamp: '2026-01-01T00:00:00.000Z',
      confidence: 0.4,
      scope: 'url:https://status.example.com',
      ttl_seconds: 60,
      metadata: {}
    }
  },
  claims: {
    cccc3333: {
      id: 'cccc3333',
      statement: 'According to the file, the port is 8080 [aaaa1111].',
      claim_type: 'fact',
      source_observations: ['aaaa1111'],
      transform_chain: [
        { operation: 'extract', description: 'Extracted from observations', input_ids: ['aaaa1111'], confidence_delta: 0 }
      ],
      confidence: 1,
      scope: '',
      created_at: '2026-01-01T00:00:10.000Z'
    }
  }
};

describe('inspectLedger', () => {
  it('reports a fresh ledger', () => {
    const report = inspectLedger(ledger, { minConfidence: 0.5 }, new Date('2026-01-01T00:00:30.000Z'));

    expect(report.summary).toBe(
      [
        '[Observation summary]',
        'Valid observations: 2',
        '  - [aaaa1111] read_file (confidence: 100%)',
        '  - [bbbb2222] read_url (confidence: 40%)'
      ].join('\n')
    );
    expect(report.degradationLevel).toBe(DegradationLevel.PARTIAL_WITH_UNCERTAINTY);
    expect(report.validObservationIds).toEqual(['aaaa1111']);
    expect(report.expiredObservationIds).toEqual([]);
    expect(report.claimAuditTrails).toEqual([]);
  });

  it('reports expired observations without dropping them', () => {
    const report = inspectLedger(ledger, {}, new Date('2026-01-01T00:05:00.000Z'));

    expect(report.validObservationIds).toEqual(['aaaa1111']);
    expect(report.expiredObservationIds).toEqual(['bbbb2222']);
    expect(report.degradationLevel).toBe(DegradationLevel.FULL_ANSWER);
    expect(report.summary.split('\n').pop()).toBe('Expired: 1');
  });

  it('prints claim audit trails on request', () => {
    const report = inspectLedger(ledger, { claims: true }, new Date('2026-01-01T00:00:30.000Z'));

    expect(report.claimAuditTrails).toHaveLength(1);
    const lines = report.claimAuditTrails[0].split('\n');
    expect(lines[0]).toBe('Claim: According to the file, the port is 8080 [aaaa1111].');
    expect(lines[1]).toBe('Type: fact');
    expect(lines).toContain('  - aaaa1111');
    expect(lines).toContain('  1. [extract] Extracted from observations');
  });

  it('rejects malformed ledgers', () => {
    expect(() => inspectLedger({ observations: 5 })).toThrow(/^Invalid ledger: observations: /);
  });
});
