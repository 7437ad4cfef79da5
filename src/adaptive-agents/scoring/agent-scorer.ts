/**
 * Agent Scorer - 4-Factor Agent Scoring Algorithm
 *
 * Ranks agents against a task's required capabilities.
 *
 * Scoring Factors:
 * 1. Capability Match (40%) - Fraction of required capabilities the agent has
 * 2. Confidence (35%) - Mean learned confidence over required capabilities
 * 3. Success Rate (15%) - Mean recent success rate over required capabilities
 * 4. Availability (10%) - 1 / (1 + load)
 *
 * Every factor is normalized to [0, 1] and the weights sum to 1.0, so the overall
 * score is in [0, 1]. Capabilities the agent has never observed contribute the
 * neutral prior (0.5) rather than being dropped.
 *
 * @module adaptive-agents/scoring
 */

import type { ConfidenceReader } from '../learning/confidence-model';
import { NEUTRAL_PRIOR } from '../learning/confidence-model';
import type { Capability } from '../core/types';

// ============================================================================
// TYPES AND INTERFACES
// ============================================================================

/**
 * What the scorer needs to know about an agent
 */
export interface ScorableAgent {
  id: string;
  capabilities: readonly Capability[];
  model: ConfidenceReader;
  /** Number of in-flight tasks */
  load: number;
}

/**
 * What the scorer needs to know about a task
 */
export interface ScorableTask {
  id: string;
  requiredCapabilities: readonly Capability[];
}

/**
 * Per-factor values, each in [0, 1] before weighting
 */
export interface ScoreBreakdown {
  capabilityMatch: number;
  confidence: number;
  successRate: number;
  availability: number;
}

export type ScoringWeights = Readonly<ScoreBreakdown>;

/**
 * Complete agent scoring result
 */
export interface AgentScore {
  agentId: string;
  taskId: string;
  /** Weighted total in [0, 1] */
  totalScore: number;
  breakdown: ScoreBreakdown;
  matchedCapabilities: Capability[];
  missingCapabilities: Capability[];
  /** Human-readable match reasoning */
  matchReason: string;
}

// ============================================================================
// WEIGHTS
// ============================================================================

/**
 * Fixed scoring weights: coverage first, learned confidence second,
 * track record third, load balancing last.
 */
export const SCORING_WEIGHTS: ScoringWeights = Object.freeze({
  capabilityMatch: 0.40,
  confidence: 0.35,
  successRate: 0.15,
  availability: 0.10,
});

const WEIGHT_TOLERANCE = 1e-9;

export function sumWeights(weights: ScoringWeights): number {
  return weights.capabilityMatch + weights.confidence + weights.successRate + weights.availability;
}

/**
 * Throws if the weights do not sum to 1.0
 */
export function validateWeights(weights: ScoringWeights): void {
  const sum = sumWeights(weights);
  if (Math.abs(sum - 1.0) > WEIGHT_TOLERANCE) {
    throw new Error(
      `Scoring weights must sum to 1.0 (got ${sum}). ` +
      `Adjust weights: ${JSON.stringify(weights)}`
    );
  }
}

validateWeights(SCORING_WEIGHTS);

// ============================================================================
// AGENT SCORER CLASS
// ============================================================================

/**
 * AgentScorer - stateless scoring of (agent, task) pairs
 *
 * @example
 * ```typescript
 * const scorer = new AgentScorer();
 * const ranked = scorer.rankAgents(agents, task);
 * console.log(`${ranked[0].agentId}: ${ranked[0].matchReason}`);
 * ```
 */
export class AgentScorer {
  /**
   * Weighted fitness in [0, 1]
   */
  public score(agent: ScorableAgent, task: ScorableTask): number {
    return this.calculateScore(agent, task).totalScore;
  }

  /**
   * Calculate the complete score for an agent against a task
   */
  public calculateScore(agent: ScorableAgent, task: ScorableTask): AgentScore {
    const owned = new Set(agent.capabilities);
    const matchedCapabilities = task.requiredCapabilities.filter(cap => owned.has(cap));
    const missingCapabilities = task.requiredCapabilities.filter(cap => !owned.has(cap));

    const breakdown: ScoreBreakdown = {
      capabilityMatch: this.calculateCapabilityMatch(matchedCapabilities.length, task),
      confidence: this.calculateConfidence(agent, task),
      successRate: this.calculateSuccessRate(agent, task),
      availability: this.calculateAvailability(agent),
    };

    const totalScore = this.calculateOverallScore(breakdown);

    return {
      agentId: agent.id,
      taskId: task.id,
      totalScore,
      breakdown,
      matchedCapabilities,
      missingCapabilities,
      matchReason: this.generateMatchReason(breakdown, missingCapabilities),
    };
  }

  /**
   * Score multiple agents and return them best first.
   * Equal scores are ordered by agent id so rankings are reproducible.
   */
  public rankAgents(agents: readonly ScorableAgent[], task: ScorableTask): AgentScore[] {
    return agents
      .map(agent => this.calculateScore(agent, task))
      .sort(compareScores);
  }

  /**
   * Number of required capabilities the agent has
   */
  public capabilityOverlap(agent: ScorableAgent, task: ScorableTask): number {
    const owned = new Set(agent.capabilities);
    return task.requiredCapabilities.filter(cap => owned.has(cap)).length;
  }

  public getWeights(): ScoringWeights {
    return SCORING_WEIGHTS;
  }

  // ==========================================================================
  // FACTOR CALCULATION METHODS
  // ==========================================================================

  /**
   * Factor 1: matched / required
   */
  private calculateCapabilityMatch(matched: number, task: ScorableTask): number {
    if (task.requiredCapabilities.length === 0) {
      return 0;
    }
    return matched / task.requiredCapabilities.length;
  }

  /**
   * Factor 2: mean confidence, neutral prior for unobserved capabilities
   */
  private calculateConfidence(agent: ScorableAgent, task: ScorableTask): number {
    return mean(
      task.requiredCapabilities.map(cap => agent.model.peekConfidence(cap)),
      NEUTRAL_PRIOR
    );
  }

  /**
   * Factor 3: mean success rate, neutral prior for empty histories
   */
  private calculateSuccessRate(agent: ScorableAgent, task: ScorableTask): number {
    return mean(
      task.requiredCapabilities.map(cap => agent.model.getSuccessRate(cap)),
      NEUTRAL_PRIOR
    );
  }

  /**
   * Factor 4: 1.0 when idle, decreasing with load, never negative
   */
  private calculateAvailability(agent: ScorableAgent): number {
    const load = Math.max(0, agent.load);
    return 1 / (1 + load);
  }

  // ==========================================================================
  // HELPER METHODS
  // ==========================================================================

  private calculateOverallScore(breakdown: ScoreBreakdown): number {
    const total =
      breakdown.capabilityMatch * SCORING_WEIGHTS.capabilityMatch +
      breakdown.confidence * SCORING_WEIGHTS.confidence +
      breakdown.successRate * SCORING_WEIGHTS.successRate +
      breakdown.availability * SCORING_WEIGHTS.availability;

    return Math.min(1, Math.max(0, total));
  }

  private generateMatchReason(breakdown: ScoreBreakdown, missing: Capability[]): string {
    const reasons: string[] = [];

    if (breakdown.capabilityMatch === 1) {
      reasons.push('Full capability match');
    } else if (breakdown.capabilityMatch > 0) {
      reasons.push(`Partial capability match (missing: ${missing.join(', ')})`);
    } else {
      reasons.push('No capability overlap');
    }

    reasons.push(`${Math.round(breakdown.confidence * 100)}% confidence`);
    reasons.push(`${Math.round(breakdown.successRate * 100)}% recent success`);

    if (breakdown.availability < 1) {
      reasons.push(`${Math.round(breakdown.availability * 100)}% availability`);
    }

    return reasons.join('; ');
  }
}

// ============================================================================
// UTILITIES
// ============================================================================

/**
 * Higher score first, then agent id ascending
 */
export function compareScores(a: AgentScore, b: AgentScore): number {
  if (b.totalScore !== a.totalScore) {
    return b.totalScore - a.totalScore;
  }
  if (a.agentId < b.agentId) return -1;
  if (a.agentId > b.agentId) return 1;
  return 0;
}

function mean(values: number[], fallback: number): number {
  if (values.length === 0) {
    return fallback;
  }
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/**
 * Create a scorer with the fixed weights
 */
export function createDefaultScorer(): AgentScorer {
  return new AgentScorer();
}
