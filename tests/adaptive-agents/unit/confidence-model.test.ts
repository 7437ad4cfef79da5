/**
 * Unit Tests for the per-capability Confidence Model
 *
 * Tests:
 * - Neutral prior and lazy materialization
 * - Learning rule and its bounds
 * - Sliding outcome window and success rate
 * - Adaptability score and expertise
 */

import { describe, expect, it } from '@jest/globals';
import {
  ConfidenceModel,
  HISTORY_WINDOW,
  NEUTRAL_PRIOR
} from '../../../src/adaptive-agents/learning/confidence-model';
import { ValidationError } from '../../../src/adaptive-agents/core/errors';

describe('ConfidenceModel', () => {
  describe('Neutral prior', () => {
    it('should start every capability at 0.5', () => {
      const model = new ConfidenceModel();
      expect(model.getConfidence('data_analysis')).toBe(NEUTRAL_PRIOR);
    });

    it('should materialize capabilities read through getConfidence', () => {
      const model = new ConfidenceModel();
      model.getConfidence('data_analysis');
      expect(model.hasObserved('data_analysis')).toBe(true);
      expect(model.getCapabilities()).toEqual(['data_analysis']);
    });

    it('should not materialize capabilities read through peekConfidence', () => {
      const model = new ConfidenceModel();
      expect(model.peekConfidence('optimization')).toBe(0.5);
      expect(model.hasObserved('optimization')).toBe(false);
      expect(model.getCapabilities()).toEqual([]);
    });

    it('should seed listed capabilities at construction', () => {
      const model = new ConfidenceModel({ capabilities: ['a', 'b'] });
      expect(model.snapshot().confidence).toEqual({ a: 0.5, b: 0.5 });
      expect(model.snapshot().history).toEqual({ a: [], b: [] });
    });

    it('should report a 0.5 success rate for an empty history', () => {
      const model = new ConfidenceModel({ capabilities: ['a'] });
      expect(model.getSuccessRate('a')).toBe(0.5);
      expect(model.getSuccessRate('never-seen')).toBe(0.5);
    });
  });

  describe('Learning rule', () => {
    it('should move a fresh capability to 0.55 after one success', () => {
      const model = new ConfidenceModel();
      const update = model.update('data_analysis', true);

      expect(update.before).toBe(0.5);
      expect(update.after).toBeCloseTo(0.55, 10);
      expect(update.delta).toBeCloseTo(0.05, 10);
      expect(update.outcome).toBe(true);
      expect(model.getHistory('data_analysis')).toEqual([1]);
    });

    it('should move to 0.495 after a success followed by a failure', () => {
      const model = new ConfidenceModel();
      model.update('data_analysis', true);
      const update = model.update('data_analysis', false);

      expect(update.before).toBeCloseTo(0.55, 10);
      expect(update.after).toBeCloseTo(0.495, 10);
      expect(model.getHistory('data_analysis')).toEqual([1, 0]);
    });

    it('should move a fresh capability to 0.45 after one failure', () => {
      const model = new ConfidenceModel();
      expect(model.update('x', false).after).toBeCloseTo(0.45, 10);
    });

    it('should reach exactly 1 and 0 with a learning rate of 1', () => {
      const model = new ConfidenceModel({ learningRate: 1 });
      expect(model.update('x', true).after).toBe(1);
      expect(model.update('x', false).after).toBe(0);
    });

    it('should never leave [0, 1]', () => {
      const model = new ConfidenceModel({ learningRate: 0.9 });
      for (let i = 0; i < 50; i++) {
        const value = model.update('x', i % 3 !== 0).after;
        expect(value).toBeGreaterThanOrEqual(0);
        expect(value).toBeLessThanOrEqual(1);
      }
    });

    it('should not move confidence with a learning rate of 0', () => {
      const model = new ConfidenceModel({ learningRate: 0 });
      expect(model.update('x', true).after).toBe(0.5);
    });

    it('should reject learning rates outside [0, 1]', () => {
      expect(() => new ConfidenceModel({ learningRate: 1.5 })).toThrow(ValidationError);
      const model = new ConfidenceModel();
      expect(() => model.setLearningRate(-0.1)).toThrow(ValidationError);
      expect(model.getLearningRate()).toBe(0.1);
    });

    it('should apply a changed learning rate to later updates', () => {
      const model = new ConfidenceModel();
      model.setLearningRate(0.3);
      expect(model.update('x', true).after).toBeCloseTo(0.65, 10);
    });
  });

  describe('Outcome window', () => {
    it('should compute the success rate over the recorded outcomes', () => {
      const model = new ConfidenceModel();
      model.update('x', true);
      model.update('x', true);
      model.update('x', false);
      expect(model.getSuccessRate('x')).toBeCloseTo(2 / 3, 10);
    });

    it('should keep only the most recent outcomes, oldest first', () => {
      const model = new ConfidenceModel();
      const outcomes = [1, 0, 0, 1, 1, 0, 1, 0, 1, 1, 0];
      for (const outcome of outcomes) {
        model.update('x', outcome === 1);
      }

      expect(model.getHistory('x')).toEqual(outcomes.slice(-HISTORY_WINDOW));
      expect(model.getHistory('x')).toEqual([0, 0, 1, 1, 0, 1, 0, 1, 1, 0]);
      expect(model.getSuccessRate('x')).toBeCloseTo(0.5, 10);
    });

    it('should keep histories separate per capability', () => {
      const model = new ConfidenceModel();
      model.update('a', true);
      model.update('b', false);
      expect(model.getHistory('a')).toEqual([1]);
      expect(model.getHistory('b')).toEqual([0]);
    });
  });

  describe('Adaptability and expertise', () => {
    it('should start adaptability at 0.5', () => {
      expect(new ConfidenceModel().getAdaptabilityScore()).toBe(0.5);
    });

    it('should smooth the normalized movement of each update', () => {
      const model = new ConfidenceModel();
      model.update('x', true);
      expect(model.getAdaptabilityScore()).toBeCloseTo(0.5, 10);
      model.update('x', false);
      expect(model.getAdaptabilityScore()).toBeCloseTo(0.525, 10);
    });

    it('should decay adaptability when the learning rate is 0', () => {
      const model = new ConfidenceModel({ learningRate: 0 });
      model.update('x', true);
      expect(model.getAdaptabilityScore()).toBe(0.25);
    });

    it('should list capabilities with a success rate above 0.9 as expertise', () => {
      const model = new ConfidenceModel();
      for (let i = 0; i < 10; i++) {
        model.update('expert', true);
      }
      for (let i = 0; i < 9; i++) {
        model.update('borderline', true);
      }
      model.update('borderline', false);
      model.getConfidence('unobserved');

      expect(model.getExpertise()).toEqual(['expert']);
    });
  });

  describe('Snapshots', () => {
    it('should average confidence over materialized capabilities', () => {
      const model = new ConfidenceModel({ capabilities: ['a', 'b'] });
      model.update('a', true);
      expect(model.getMeanConfidence()).toBeCloseTo(0.525, 10);
      expect(new ConfidenceModel().getMeanConfidence()).toBe(0);
    });

    it('should return copies that do not alias model state', () => {
      const model = new ConfidenceModel();
      model.update('a', true);

      const snapshot = model.snapshot();
      snapshot.confidence.a = 0;
      snapshot.history.a?.push(0);
      model.getHistory('a').push(0);

      expect(model.getConfidence('a')).toBeCloseTo(0.55, 10);
      expect(model.getHistory('a')).toEqual([1]);
    });
  });
});
