import { describe, it, expect, beforeEach } from 'vitest';
import { ProvenanceRegistry } from './ProvenanceRegistry.js';
import { Observation, type ObservationInit } from './Observation.js';
import { Claim } from './Claim.js';
import { ClaimType, DegradationLevel, ObservationSourceType, compareDegradation } from './types.js';
import { parseSerializedRegistry } from './schemas.js';

const T0 = new Date('2025-03-01T12:00:00.000Z');

describe('ProvenanceRegistry', () => {
  let now: Date;
  let registry: ProvenanceRegistry;

  const advance = (seconds: number) => {
    now = new Date(now.getTime() + seconds * 1000);
  };

  const observe = (id: string, confidence: number, extra: ObservationInit = {}) =>
    registry.addObservation(new Observation({ id, confidence, timestamp: now, sourceId: 'read_file', ...extra }));

  beforeEach(() => {
    now = T0;
    registry = new ProvenanceRegistry({ clock: () => now });
  });

  describe('observations', () => {
    it('stores and retrieves by id', () => {
      expect(observe('aaaaaaaa', 1)).toBe('aaaaaaaa');
      expect(registry.getObservation('aaaaaaaa')?.confidence).toBe(1);
      expect(registry.getObservation('zzzzzzzz')).toBeUndefined();
      expect(registry.observationCount).toBe(1);
    });

    it('filters valid observations by expiry and confidence', () => {
      observe('aaaaaaaa', 1.0);
      observe('bbbbbbbb', 0.4);
      observe('cccccccc', 0.9, { ttlSeconds: 30 });
      advance(60);

      expect(registry.getValidObservations().map(o => o.id)).toEqual(['aaaaaaaa', 'bbbbbbbb']);
      expect(registry.getValidObservations(0.5).map(o => o.id)).toEqual(['aaaaaaaa']);
    });

    it('reports expired ids without removing them', () => {
      observe('aaaaaaaa', 1.0, { ttlSeconds: 30 });
      advance(31);

      expect(registry.invalidateExpired()).toEqual(['aaaaaaaa']);
      expect(registry.invalidateExpired()).toEqual(['aaaaaaaa']);
      expect(registry.observationCount).toBe(1);
      expect(registry.getObservation('aaaaaaaa')).toBeDefined();
    });

    it('filters by source id and source type', () => {
      observe('aaaaaaaa', 1.0);
      observe('bbbbbbbb', 0.8, { sourceId: 'ask_user', sourceType: ObservationSourceType.USER_INPUT });

      expect(registry.getObservationsBySource('ask_user').map(o => o.id)).toEqual(['bbbbbbbb']);
      expect(registry.getObservationsByType(ObservationSourceType.TOOL_RETURN).map(o => o.id)).toEqual(['aaaaaaaa']);
    });
  });

  describe('claims', () => {
    it('recomputes confidence on add', () => {
      observe('aaaaaaaa', 0.7);
      const claim = new Claim({ sourceObservations: ['aaaaaaaa'], confidence: 1 });

      registry.addClaim(claim);
      expect(claim.confidence).toBe(0.7);
      expect(registry.getClaim(claim.id)).toBe(claim);
      expect(registry.claimCount).toBe(1);
    });

    it('drops claims whose sources expired from the valid set', () => {
      observe('aaaaaaaa', 0.9, { ttlSeconds: 30 });
      observe('bbbbbbbb', 0.9);
      const fading = new Claim({ sourceObservations: ['aaaaaaaa'], claimType: ClaimType.FACT });
      const lasting = new Claim({ sourceObservations: ['bbbbbbbb'], claimType: ClaimType.INFERENCE });
      registry.addClaim(fading);
      registry.addClaim(lasting);
      advance(31);

      expect(registry.getValidClaims(0.5)).toEqual([lasting]);
      expect(fading.confidence).toBe(0);
      expect(registry.getValidClaims(0, ClaimType.FACT)).toEqual([fading]);
    });
  });

  describe('determineDegradationLevel', () => {
    it('refuses on an empty registry', () => {
      expect(registry.determineDegradationLevel()).toBe(DegradationLevel.REFUSE);
      expect(registry.determineDegradationLevel(0, 0)).toBe(DegradationLevel.REFUSE);
    });

    it('gives a full answer with three certain observations', () => {
      observe('aaaaaaaa', 1.0, { ttlSeconds: 86400 });
      observe('bbbbbbbb', 1.0, { ttlSeconds: 86400 });
      observe('cccccccc', 1.0, { ttlSeconds: 86400 });

      for (const required of [1, 2, 3]) {
        expect(registry.determineDegradationLevel(required)).toBe(DegradationLevel.FULL_ANSWER);
      }
    });

    it('falls to partial when too few observations back a confident mean', () => {
      observe('aaaaaaaa', 1.0);
      expect(registry.determineDegradationLevel(2)).toBe(DegradationLevel.PARTIAL_WITH_UNCERTAINTY);
    });

    it('asks for more information below the minimum mean', () => {
      observe('aaaaaaaa', 0.3);
      observe('bbbbbbbb', 0.5);
      expect(registry.determineDegradationLevel()).toBe(DegradationLevel.REQUEST_MORE_INFO);
    });

    it('refuses once every observation has expired', () => {
      observe('aaaaaaaa', 1.0, { ttlSeconds: 10 });
      advance(11);
      expect(registry.determineDegradationLevel()).toBe(DegradationLevel.REFUSE);
    });

    it('orders levels from full answer to refusal', () => {
      expect(compareDegradation(DegradationLevel.FULL_ANSWER, DegradationLevel.REFUSE)).toBeLessThan(0);
      expect(compareDegradation(DegradationLevel.REQUEST_MORE_INFO, DegradationLevel.PARTIAL_WITH_UNCERTAINTY)).toBeGreaterThan(0);
      expect(compareDegradation(DegradationLevel.REFUSE, DegradationLevel.REFUSE)).toBe(0);
    });
  });

  describe('toContext', () => {
    it('says so when nothing is valid', () => {
      expect(registry.toContext()).toEqual({ text: '[No valid observations]', includedCount: 0, expiredCount: 0 });
    });

    it('mentions expired observations when nothing valid remains', () => {
      observe('aaaaaaaa', 1.0, { ttlSeconds: 10 });
      advance(11);
      expect(registry.toContext().text).toBe('[No valid observations]\n(expired observations: 1)');
    });

    it('lists the newest observations first, up to the limit', () => {
      observe('aaaaaaaa', 1.0, { content: 'first' });
      advance(1);
      observe('bbbbbbbb', 1.0, { content: 'second' });
      advance(1);
      observe('cccccccc', 1.0, { content: 'third' });

      const context = registry.toContext(2);
      expect(context.includedCount).toBe(2);
      expect(context.text).toBe(
        [
          '[Current observations]',
          '[cccccccc] source: tool return (read_file)',
          '    content: third',
          '    confidence: 100%',
          '[bbbbbbbb] source: tool return (read_file)',
          '    content: second',
          '    confidence: 100%'
        ].join('\n')
      );
    });

    it('appends the expired count after the listing', () => {
      observe('aaaaaaaa', 1.0, { content: 'kept' });
      observe('bbbbbbbb', 1.0, { content: 'stale', ttlSeconds: 5 });
      advance(6);

      const context = registry.toContext();
      expect(context.expiredCount).toBe(1);
      expect(context.text.endsWith('    confidence: 100%\n\n(expired observations: 1)')).toBe(true);
    });
  });

  describe('serialization', () => {
    it('restores observations and stored claim confidences', () => {
      observe('aaaaaaaa', 0.9, { ttlSeconds: 600, metadata: { path: '/etc/hosts' } });
      const claim = new Claim({ statement: 'hosts file maps localhost', sourceObservations: ['aaaaaaaa'] });
      registry.addClaim(claim);

      const data = registry.toDict();
      const restored = ProvenanceRegistry.fromDict(data, { clock: () => now });

      expect(restored.toDict()).toEqual(data);
      expect(restored.getClaim(claim.id)?.confidence).toBe(0.9);
    });

    it('validates exported ledgers', () => {
      observe('aaaaaaaa', 1.0);
      const json: unknown = JSON.parse(JSON.stringify(registry.toDict()));

      const ok = parseSerializedRegistry(json);
      expect(ok.success).toBe(true);

      const bad = parseSerializedRegistry({ observations: { x: { id: 'x' } } });
      expect(bad.success).toBe(false);
    });

    it('defaults a missing claims map', () => {
      const parsed = parseSerializedRegistry({ observations: {} });
      expect(parsed).toEqual({ success: true, data: { observations: {}, claims: {} } });
    });
  });

  it('clears both maps', () => {
    observe('aaaaaaaa', 1.0);
    registry.addClaim(new Claim({ sourceObservations: ['aaaaaaaa'] }));
    registry.clear();
    expect(registry.observationCount).toBe(0);
    expect(registry.claimCount).toBe(0);
  });
});
