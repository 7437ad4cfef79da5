/**
 * Adaptive Agents - Main Index
 *
 * Public surface of the adaptive assignment system: confidence learning, scoring,
 * the assignment controller and its collaborators.
 *
 * @module adaptive-agents
 */

import { Logger } from '../core/logger';
import { AssignmentController } from './core/assignment-controller';
import { AdaptiveConfigManager, type AdaptiveConfigOverrides } from './core/config-manager';

// ===== CORE TYPE EXPORTS =====
export type {
  Capability,
  Task,
  CreateTaskInput,
  PerformanceRecord,
  AgentStats,
  AgentRecord,
  RegisterAgentInput,
  AssignmentRecord,
  CompletionReport,
  AgentStatusSnapshot,
  CapabilityHistorySummary,
  AdaptivityProfile,
  SystemMetrics,
  IntelligenceMetrics
} from './core/types';

export {
  TaskStatus,
  AgentStatus,
  TASK_STATE_TRANSITIONS,
  normalizeCapability,
  normalizeCapabilities,
  getAgentStatus
} from './core/types';

// ===== ERRORS =====
export {
  AdaptiveAgentsError,
  UsageError,
  ValidationError,
  NotFoundError,
  isAdaptiveAgentsError,
  describeError
} from './core/errors';
export type { AdaptiveAgentsErrorCode } from './core/errors';

// ===== LEARNING =====
export {
  ConfidenceModel,
  NEUTRAL_PRIOR,
  HISTORY_WINDOW,
  DEFAULT_LEARNING_RATE,
  TRAINING_LEARNING_RATE,
  EXPERTISE_THRESHOLD
} from './learning/confidence-model';
export type {
  ConfidenceUpdate,
  ConfidenceModelOptions,
  ConfidenceSnapshot,
  ConfidenceReader,
  OutcomeBit
} from './learning/confidence-model';

// ===== SCORING =====
export { AgentScorer, SCORING_WEIGHTS, compareScores, createDefaultScorer } from './scoring/agent-scorer';
export type {
  AgentScore,
  ScoreBreakdown,
  ScoringWeights,
  ScorableAgent,
  ScorableTask
} from './scoring/agent-scorer';

// ===== CORE CLASS EXPORTS =====
export { AgentRegistry } from './core/agent-registry';
export { TaskStateMachine } from './core/task-state-machine';
export type { TaskTransition, TransitionHook, StateMachineConfig } from './core/task-state-machine';

export { AssignmentController, ASSIGNMENT_EVENTS } from './core/assignment-controller';
export type {
  AssignmentControllerOptions,
  CompleteOptions,
  TaskAssignedEvent,
  TaskUnassignedEvent,
  TaskCompletedEvent,
  ConfidenceUpdatedEvent,
  TrainingModeChangedEvent
} from './core/assignment-controller';

export {
  AdaptiveConfigManager,
  DEFAULT_CONFIG,
  getConfig,
  loadConfig,
  validateConfig
} from './core/config-manager';
export type { AdaptiveConfig, AdaptiveConfigOverrides, ConfigValidationResult } from './core/config-manager';

// ===== TRACKING & SIMULATION =====
export { LearningTracker } from './tracking/learning-tracker';
export type {
  LearningTrend,
  CapabilityTimeline,
  AgentLearningSummary,
  TrendChangedEvent
} from './tracking/learning-tracker';

export { TaskSimulator, createSeededRandom, createRandomSource } from './simulation/task-simulator';
export type { RandomSource, RoundResult, SimulationSummary, TaskOutcome } from './simulation/task-simulator';

export { loadCatalog, parseCatalog, templateToTaskInput, DEFAULT_CATALOG_PATH } from './catalog';
export type { CapabilityCatalog, TaskTemplate, AgentTemplate } from './catalog';

export { Logger, silentLogger } from '../core/logger';
export type { ILogger, LoggingConfig, LogLevel } from '../core/logger';

// ===== FACTORY =====

/**
 * Controller wired to the resolved configuration (file, environment, overrides)
 */
export function createAssignmentController(overrides: AdaptiveConfigOverrides = {}): AssignmentController {
  const config = AdaptiveConfigManager.getInstance().loadConfig(overrides);
  return new AssignmentController({
    config,
    logger: new Logger(config.logging, { prefix: 'adaptive-agents' })
  });
}
