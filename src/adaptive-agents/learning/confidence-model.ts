/**
 * Confidence Model
 *
 * Per-agent learned proficiency for each capability. Every reported outcome moves
 * confidence toward 1 (success) or 0 (failure) by the learning rate, and is kept in a
 * sliding window of the most recent outcomes.
 *
 * Learning rule:
 *   confidence' = confidence + learningRate * (outcome - confidence)
 *
 * The result is a convex combination of the previous value and the outcome, so it
 * stays in [0, 1] for any learning rate in [0, 1].
 *
 * @module adaptive-agents/learning
 */

import { ValidationError } from '../core/errors';
import type { Capability } from '../core/types';

/** Prior for a capability that has never been observed */
export const NEUTRAL_PRIOR = 0.5;

/** Number of recent outcomes kept per capability */
export const HISTORY_WINDOW = 10;

export const DEFAULT_LEARNING_RATE = 0.1;

export const TRAINING_LEARNING_RATE = 0.3;

/** Weight of the latest update in the adaptability score */
export const ADAPTABILITY_SMOOTHING = 0.5;

/** Success rate an agent must exceed to count as an expert */
export const EXPERTISE_THRESHOLD = 0.9;

export type OutcomeBit = 0 | 1;

/**
 * Before/after record for a single update
 */
export interface ConfidenceUpdate {
  capability: Capability;
  before: number;
  after: number;
  delta: number;
  outcome: boolean;
}

export interface ConfidenceModelOptions {
  learningRate?: number;
  capabilities?: readonly Capability[];
}

export interface ConfidenceSnapshot {
  confidence: Record<Capability, number>;
  history: Record<Capability, number[]>;
  adaptabilityScore: number;
  learningRate: number;
}

/**
 * Read side of the model, all the scorer needs
 */
export interface ConfidenceReader {
  peekConfidence(capability: Capability): number;
  getSuccessRate(capability: Capability): number;
}

export function assertLearningRate(rate: number): void {
  if (!Number.isFinite(rate) || rate < 0 || rate > 1) {
    throw new ValidationError(`Learning rate must be a number between 0 and 1 (got ${rate})`, {
      learningRate: rate,
    });
  }
}

export class ConfidenceModel implements ConfidenceReader {
  private confidence: Map<Capability, number> = new Map();
  private history: Map<Capability, OutcomeBit[]> = new Map();
  private learningRate: number;
  private adaptabilityScore = NEUTRAL_PRIOR;

  constructor(options: ConfidenceModelOptions = {}) {
    const learningRate = options.learningRate ?? DEFAULT_LEARNING_RATE;
    assertLearningRate(learningRate);
    this.learningRate = learningRate;

    for (const capability of options.capabilities ?? []) {
      this.materialize(capability);
    }
  }

  /**
   * Current confidence; a never-observed capability is materialized at the neutral prior
   */
  getConfidence(capability: Capability): number {
    return this.materialize(capability);
  }

  /**
   * Current confidence without materializing unknown capabilities
   */
  peekConfidence(capability: Capability): number {
    return this.confidence.get(capability) ?? NEUTRAL_PRIOR;
  }

  hasObserved(capability: Capability): boolean {
    return this.confidence.has(capability);
  }

  /**
   * Fraction of successes in the recent window, neutral prior when empty
   */
  getSuccessRate(capability: Capability): number {
    const outcomes = this.history.get(capability);
    if (!outcomes || outcomes.length === 0) {
      return NEUTRAL_PRIOR;
    }
    const successes = outcomes.reduce<number>((sum, bit) => sum + bit, 0);
    return successes / outcomes.length;
  }

  getHistory(capability: Capability): OutcomeBit[] {
    return [...(this.history.get(capability) ?? [])];
  }

  getLearningRate(): number {
    return this.learningRate;
  }

  setLearningRate(rate: number): void {
    assertLearningRate(rate);
    this.learningRate = rate;
  }

  getAdaptabilityScore(): number {
    return this.adaptabilityScore;
  }

  /**
   * Record an outcome and apply the learning rule
   */
  update(capability: Capability, outcome: boolean): ConfidenceUpdate {
    const bit: OutcomeBit = outcome ? 1 : 0;

    const before = this.materialize(capability);
    const outcomes = this.history.get(capability) ?? [];
    outcomes.push(bit);
    while (outcomes.length > HISTORY_WINDOW) {
      outcomes.shift();
    }
    this.history.set(capability, outcomes);

    const after = before + this.learningRate * (bit - before);
    this.confidence.set(capability, after);

    this.recomputeAdaptability(Math.abs(after - before));

    return {
      capability,
      before,
      after,
      delta: after - before,
      outcome,
    };
  }

  /**
   * Capabilities with a non-empty history and a success rate above the threshold
   */
  getExpertise(threshold: number = EXPERTISE_THRESHOLD): Capability[] {
    const expertise: Capability[] = [];
    for (const [capability, outcomes] of this.history) {
      if (outcomes.length > 0 && this.getSuccessRate(capability) > threshold) {
        expertise.push(capability);
      }
    }
    return expertise;
  }

  getCapabilities(): Capability[] {
    return Array.from(this.confidence.keys());
  }

  getMeanConfidence(): number {
    if (this.confidence.size === 0) {
      return 0;
    }
    let total = 0;
    for (const value of this.confidence.values()) {
      total += value;
    }
    return total / this.confidence.size;
  }

  snapshot(): ConfidenceSnapshot {
    const confidence: Record<Capability, number> = {};
    const history: Record<Capability, number[]> = {};

    for (const [capability, value] of this.confidence) {
      confidence[capability] = value;
      history[capability] = [...(this.history.get(capability) ?? [])];
    }

    return {
      confidence,
      history,
      adaptabilityScore: this.adaptabilityScore,
      learningRate: this.learningRate,
    };
  }

  private materialize(capability: Capability): number {
    const existing = this.confidence.get(capability);
    if (existing !== undefined) {
      return existing;
    }
    this.confidence.set(capability, NEUTRAL_PRIOR);
    if (!this.history.has(capability)) {
      this.history.set(capability, []);
    }
    return NEUTRAL_PRIOR;
  }

  /**
   * The move is normalized by the learning rate, giving how surprising the outcome
   * was (0 = fully expected, 1 = fully unexpected), then smoothed.
   */
  private recomputeAdaptability(movement: number): void {
    const surprise = this.learningRate > 0 ? Math.min(1, movement / this.learningRate) : 0;
    this.adaptabilityScore =
      (1 - ADAPTABILITY_SMOOTHING) * this.adaptabilityScore + ADAPTABILITY_SMOOTHING * surprise;
  }
}
