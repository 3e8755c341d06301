import { describe, it, expect } from 'vitest';
import { CognitiveState } from './CognitiveState.js';
import { INITIAL_CONFIDENCE } from './types.js';

describe('CognitiveState', () => {
  it('starts at the initial confidence with empty counters', () => {
    const state = new CognitiveState({ goalStatement: 'find the port' });
    expect(state.confidence).toBe(INITIAL_CONFIDENCE);
    expect(state.iterationCount).toBe(0);
    expect(state.stallCount).toBe(0);
    expect(state.uncertainties).toEqual([]);
    expect(state.goalStatement).toBe('find the port');
  });

  it('clamps confidence updates', () => {
    const state = new CognitiveState();
    state.updateConfidence(1.4);
    expect(state.confidence).toBe(1);
    state.updateConfidence(-1);
    expect(state.confidence).toBe(0);
  });

  it('keeps uncertainties ordered and unique', () => {
    const state = new CognitiveState();
    state.addUncertainty('goal unclear');
    state.addUncertainty('missing data');
    state.addUncertainty('goal unclear');
    expect(state.uncertainties).toEqual(['goal unclear', 'missing data']);

    state.removeUncertainty('goal unclear');
    expect(state.uncertainties).toEqual(['missing data']);
  });

  it('resets the stall count on progress', () => {
    const state = new CognitiveState();
    state.markStall();
    state.markStall();
    expect(state.hasStalled(2)).toBe(true);
    expect(state.hasStalled()).toBe(false);

    state.markProgress();
    expect(state.stallCount).toBe(0);
  });

  it('averages recorded observation confidence', () => {
    const state = new CognitiveState();
    expect(state.averageObservationConfidence()).toBe(0);

    state.recordObservation(1.0);
    state.recordObservation(0.5);
    expect(state.observationCount).toBe(2);
    expect(state.averageObservationConfidence()).toBe(0.75);
  });

  describe('toContext', () => {
    it('is empty when nothing is notable', () => {
      const state = new CognitiveState({ confidence: 0.9 });
      expect(state.toContext()).toBe('');
    });

    it('lists low confidence, the first two uncertainties, slow progress and missing observations', () => {
      const state = new CognitiveState();
      state.addUncertainty('a');
      state.addUncertainty('b');
      state.addUncertainty('c');
      state.markStall();
      state.markStall();
      state.incrementIteration();

      expect(state.toContext()).toBe(
        [
          'Current confidence is low (30%)',
          'Open uncertainties: a, b',
          'Progress is slow; consider switching strategy',
          'Note: no observations have been gathered yet'
        ].join('\n')
      );
    });

    it('flags weak observations', () => {
      const state = new CognitiveState({ confidence: 0.9 });
      state.recordObservation(0.5);
      expect(state.toContext()).toBe('Observation confidence is low (50%)');
    });
  });

  it('serializes its counters', () => {
    const state = new CognitiveState({ goalStatement: 'g' });
    state.incrementIteration();
    state.recordObservation(0.8);
    state.currentHypothesis = 'h';

    expect(state.toDict()).toEqual({
      confidence: INITIAL_CONFIDENCE,
      uncertainties: [],
      iteration_count: 1,
      stall_count: 0,
      goal_statement: 'g',
      current_hypothesis: 'h',
      observation_count: 1,
      average_observation_confidence: 0.8
    });
  });
});
