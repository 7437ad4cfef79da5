/**
 * Assignment Controller
 *
 * Coordinates agent-to-task assignments using the 4-factor scoring algorithm and
 * closes the learning loop when tasks complete.
 *
 * Assignment workflow:
 * 1. Filter agents with at least one required capability
 * 2. Score eligible agents
 * 3. Select best match (ties broken by agent id)
 * 4. Record assignment and increment the agent's load
 *
 * Completion workflow:
 * 1. Reject unassigned or already completed tasks
 * 2. Feed the outcome into the agent's confidence model for every required capability
 * 3. Decrement load and record performance
 * 4. Emit before/after confidence deltas
 *
 * Steps 2-4 of assignment run in one synchronous turn, so no other assignment can
 * observe the load between ranking and the increment.
 */

import { EventEmitter } from 'events';
import { Logger, type ILogger } from '../../core/logger';
import { AgentRegistry } from './agent-registry';
import { DEFAULT_CONFIG, type AdaptiveConfig } from './config-manager';
import { NotFoundError, UsageError, ValidationError } from './errors';
import { TaskStateMachine } from './task-state-machine';
import {
  TaskStatus,
  getAgentStatus,
  normalizeCapabilities,
  type AdaptivityProfile,
  type AgentRecord,
  type AgentStatusSnapshot,
  type AssignmentRecord,
  type Capability,
  type CapabilityHistorySummary,
  type CompletionReport,
  type CreateTaskInput,
  type IntelligenceMetrics,
  type RegisterAgentInput,
  type SystemMetrics,
  type Task
} from './types';
import { ConfidenceModel, type ConfidenceUpdate } from '../learning/confidence-model';
import { AgentScorer, type AgentScore } from '../scoring/agent-scorer';

/**
 * Event names emitted by the controller
 */
export const ASSIGNMENT_EVENTS = {
  AGENT_REGISTERED: 'agent:registered',
  TASK_CREATED: 'task:created',
  TASK_ASSIGNED: 'task:assigned',
  TASK_UNASSIGNED: 'task:unassigned',
  TASK_COMPLETED: 'task:completed',
  CONFIDENCE_UPDATED: 'confidence:updated',
  TRAINING_MODE_CHANGED: 'training:changed'
} as const;

export interface TaskAssignedEvent {
  task: Task;
  agentId: string;
  score: AgentScore;
  candidates: AgentScore[];
}

export interface TaskUnassignedEvent {
  task: Task;
  reason: string;
  candidatesConsidered: number;
}

export interface ConfidenceUpdatedEvent extends ConfidenceUpdate {
  agentId: string;
  taskId: string;
  timestamp: Date;
}

export interface TaskCompletedEvent {
  task: Task;
  report: CompletionReport;
}

export interface TrainingModeChangedEvent {
  enabled: boolean;
  learningRate: number;
}

export interface CompleteOptions {
  /** Overrides the measured assigned → completed duration */
  durationMs?: number;
}

export interface AssignmentControllerOptions {
  config?: AdaptiveConfig;
  registry?: AgentRegistry;
  scorer?: AgentScorer;
  stateMachine?: TaskStateMachine;
  logger?: ILogger;
  clock?: () => Date;
}

/** Weights of the per-agent overall score */
const OVERALL_SUCCESS_WEIGHT = 0.6;
const OVERALL_CONFIDENCE_WEIGHT = 0.4;

/** Learning events at which the intelligence metric saturates */
const LEARNING_EVENTS_SATURATION = 100;

/**
 * Assignment Controller
 *
 * Owns the agent/task registry and drives the assign → complete → learn loop.
 */
export class AssignmentController extends EventEmitter {
  private readonly config: AdaptiveConfig;
  private readonly registry: AgentRegistry;
  private readonly scorer: AgentScorer;
  private readonly stateMachine: TaskStateMachine;
  private readonly logger: ILogger;
  private readonly clock: () => Date;

  /** Agent each in-flight task was handed to, including agents outside the registry */
  private assignedAgents: Map<string, AgentRecord> = new Map();
  private baseLearningRates: Map<string, number> = new Map();
  private assignmentHistory: AssignmentRecord[] = [];
  private trainingMode: boolean;
  private totals = {
    created: 0,
    completed: 0,
    failed: 0,
    completionTimeMs: 0
  };

  constructor(options: AssignmentControllerOptions = {}) {
    super();
    this.config = options.config ?? DEFAULT_CONFIG;
    this.registry = options.registry ?? new AgentRegistry();
    this.scorer = options.scorer ?? new AgentScorer();
    this.stateMachine = options.stateMachine ?? new TaskStateMachine();
    this.logger = options.logger ?? new Logger(this.config.logging, { prefix: 'AssignmentController' });
    this.clock = options.clock ?? (() => new Date());
    this.trainingMode = this.config.learning.trainingMode;
  }

  // ==========================================================================
  // Agents and tasks
  // ==========================================================================

  /**
   * Register an agent; every listed capability starts at the neutral prior
   */
  public registerAgent(input: RegisterAgentInput): AgentRecord {
    const name = input.name.trim();
    if (name === '') {
      throw new ValidationError('Agent name cannot be empty');
    }

    const capabilities = normalizeCapabilities(input.capabilities);
    const baseLearningRate = input.learningRate ?? this.config.learning.learningRate;
    const now = this.clock();
    const agent: AgentRecord = {
      id: input.id ?? this.registry.nextAgentId(),
      name,
      capabilities,
      model: new ConfidenceModel({
        learningRate: this.trainingMode ? this.config.learning.trainingLearningRate : baseLearningRate,
        capabilities
      }),
      load: 0,
      stats: {
        tasksCompleted: 0,
        tasksFailed: 0,
        averageSuccessRate: 0
      },
      performanceHistory: [],
      createdAt: now,
      lastActivity: now
    };

    this.registry.addAgent(agent);
    this.baseLearningRates.set(agent.id, baseLearningRate);
    this.emit(ASSIGNMENT_EVENTS.AGENT_REGISTERED, agent);
    this.logger.debug(`Registered agent '${agent.name}'`, { agentId: agent.id, capabilities });

    return agent;
  }

  /**
   * Create a task in the CREATED state
   */
  public createTask(input: CreateTaskInput): Task {
    const name = input.name.trim();
    if (name === '') {
      throw new ValidationError('Task name cannot be empty');
    }

    const requiredCapabilities = normalizeCapabilities(input.requiredCapabilities);
    if (requiredCapabilities.length === 0) {
      throw new ValidationError(`Task '${name}' must require at least one capability`);
    }

    const priority = input.priority ?? 1;
    const complexity = input.complexity ?? 1;
    const estimatedDuration = input.estimatedDuration ?? 1;

    assertRange('priority', priority, 1, 10);
    assertRange('complexity', complexity, 1, 10);
    if (!Number.isFinite(estimatedDuration) || estimatedDuration <= 0) {
      throw new ValidationError(`estimatedDuration must be a positive number (got ${estimatedDuration})`);
    }

    const task: Task = {
      id: input.id ?? this.registry.nextTaskId(),
      name,
      description: input.description ?? '',
      requiredCapabilities,
      priority,
      complexity,
      estimatedDuration,
      status: TaskStatus.CREATED,
      createdAt: this.clock(),
      metadata: { ...input.metadata }
    };

    this.trackTask(task);
    this.emit(ASSIGNMENT_EVENTS.TASK_CREATED, task);

    return task;
  }

  public getAgent(agentId: string): AgentRecord | undefined {
    return this.registry.getAgent(agentId);
  }

  public getTask(taskId: string): Task | undefined {
    return this.registry.getTask(taskId);
  }

  public listAgents(): AgentRecord[] {
    return this.registry.listAgents();
  }

  public listTasks(): Task[] {
    return this.registry.listTasks();
  }

  public getRegistry(): AgentRegistry {
    return this.registry;
  }

  public getStateMachine(): TaskStateMachine {
    return this.stateMachine;
  }

  // ==========================================================================
  // Assignment
  // ==========================================================================

  /**
   * Assign a task to the best eligible agent
   *
   * @param task - Task in the CREATED state
   * @param agents - Candidate pool (default: every registered agent)
   * @returns The chosen agent id, or null when no agent is eligible
   * @throws UsageError if the task is not in the CREATED state
   */
  public assign(task: Task, agents: readonly AgentRecord[] = this.registry.listAgents()): string | null {
    if (task.status !== TaskStatus.CREATED) {
      throw new UsageError(`Task ${task.id} is ${task.status}; only CREATED tasks can be assigned`, {
        taskId: task.id,
        status: task.status
      });
    }

    if (!this.registry.getTask(task.id)) {
      this.trackTask(task);
    }

    const eligible = this.getEligibleAgents(task, agents);
    const candidates = this.scorer
      .rankAgents(eligible, task)
      .filter(score => score.totalScore >= this.config.assignment.minimumScore);

    const best = candidates[0];
    if (!best) {
      const reason = eligible.length === 0
        ? 'No agent has any of the required capabilities'
        : `No agent reached the minimum score ${this.config.assignment.minimumScore}`;
      const event: TaskUnassignedEvent = { task, reason, candidatesConsidered: agents.length };
      this.emit(ASSIGNMENT_EVENTS.TASK_UNASSIGNED, event);
      this.logger.debug(`Task '${task.name}' left unassigned: ${reason}`, { taskId: task.id });
      return null;
    }

    const agent = eligible.find(candidate => candidate.id === best.agentId);
    if (!agent) {
      throw new NotFoundError(`Ranked agent is not in the candidate pool: ${best.agentId}`);
    }

    const now = this.clock();
    this.stateMachine.transition(task, TaskStatus.ASSIGNED, `Best match with score ${best.totalScore.toFixed(3)}`);
    task.assignedAgentId = agent.id;
    task.assignedAt = now;
    task.score = best.totalScore;
    agent.load += 1;
    agent.lastActivity = now;
    this.assignedAgents.set(task.id, agent);

    this.assignmentHistory.push({
      taskId: task.id,
      agentId: agent.id,
      score: best.totalScore,
      breakdown: best.breakdown,
      timestamp: now
    });

    const event: TaskAssignedEvent = { task, agentId: agent.id, score: best, candidates };
    this.emit(ASSIGNMENT_EVENTS.TASK_ASSIGNED, event);
    this.logger.info(`Assigned '${task.name}' to '${agent.name}' (score ${best.totalScore.toFixed(3)})`, {
      taskId: task.id,
      agentId: agent.id
    });

    return agent.id;
  }

  /**
   * Like {@link assign}, for callers that require a match
   *
   * @throws UsageError if the pool is empty or no agent is eligible
   */
  public assignOrThrow(task: Task, agents: readonly AgentRecord[] = this.registry.listAgents()): string {
    if (agents.length === 0) {
      throw new UsageError(`Cannot assign task ${task.id}: the agent pool is empty`, { taskId: task.id });
    }

    const agentId = this.assign(task, agents);
    if (agentId === null) {
      throw new UsageError(`No eligible agent for task ${task.id}`, {
        taskId: task.id,
        requiredCapabilities: task.requiredCapabilities
      });
    }
    return agentId;
  }

  /**
   * Assign every CREATED task, highest priority first
   */
  public assignPendingTasks(): AssignmentRecord[] {
    const pending = this.registry
      .listTasks()
      .filter(task => task.status === TaskStatus.CREATED)
      .sort((a, b) => b.priority - a.priority);

    const records: AssignmentRecord[] = [];
    for (const task of pending) {
      if (this.assign(task) !== null) {
        const record = this.assignmentHistory[this.assignmentHistory.length - 1];
        if (record) {
          records.push(record);
        }
      }
    }
    return records;
  }

  /**
   * Agents allowed into the ranking for a task
   */
  public getEligibleAgents(task: Task, agents: readonly AgentRecord[]): AgentRecord[] {
    if (!this.config.assignment.requireCapabilityOverlap) {
      return [...agents];
    }
    return agents.filter(agent => this.scorer.capabilityOverlap(agent, task) > 0);
  }

  /**
   * Score every agent in the pool without assigning
   */
  public previewScores(task: Task, agents: readonly AgentRecord[] = this.registry.listAgents()): AgentScore[] {
    return this.scorer.rankAgents(agents, task);
  }

  // ==========================================================================
  // Completion
  // ==========================================================================

  /**
   * Report a task outcome and update the assigned agent's confidence
   *
   * @throws UsageError if the task was never assigned or is already completed
   */
  public complete(task: Task, success: boolean, options: CompleteOptions = {}): CompletionReport {
    if (task.status === TaskStatus.CREATED || task.assignedAgentId === undefined) {
      throw new UsageError(`Task ${task.id} has not been assigned`, { taskId: task.id });
    }

    const agentId = task.assignedAgentId;
    const agent = this.assignedAgents.get(task.id) ?? this.registry.getAgent(agentId);
    if (!agent) {
      throw new NotFoundError(`Agent not found: ${agentId}`, { agentId, taskId: task.id });
    }

    this.stateMachine.transition(task, TaskStatus.COMPLETED, success ? 'Reported success' : 'Reported failure');

    const completedAt = this.clock();
    const deltas = task.requiredCapabilities.map(capability => agent.model.update(capability, success));

    agent.load = Math.max(0, agent.load - 1);
    agent.lastActivity = completedAt;
    this.assignedAgents.delete(task.id);

    const durationMs = options.durationMs ??
      (task.assignedAt ? completedAt.getTime() - task.assignedAt.getTime() : 0);

    this.recordPerformance(agent, task, success, durationMs, completedAt);

    task.outcome = success;
    task.completedAt = completedAt;

    if (success) {
      this.totals.completed += 1;
    } else {
      this.totals.failed += 1;
    }
    this.totals.completionTimeMs += durationMs;

    const report: CompletionReport = {
      taskId: task.id,
      agentId,
      success,
      deltas,
      durationMs,
      completedAt
    };

    this.logCompletion(agent, task, report);

    for (const delta of deltas) {
      const event: ConfidenceUpdatedEvent = { ...delta, agentId, taskId: task.id, timestamp: completedAt };
      this.emit(ASSIGNMENT_EVENTS.CONFIDENCE_UPDATED, event);
    }
    const completedEvent: TaskCompletedEvent = { task, report };
    this.emit(ASSIGNMENT_EVENTS.TASK_COMPLETED, completedEvent);

    return report;
  }

  // ==========================================================================
  // Learning controls
  // ==========================================================================

  /**
   * Switch every agent between its own learning rate and the shared training rate
   */
  public setTrainingMode(enabled: boolean): void {
    this.trainingMode = enabled;
    const learningRate = this.currentLearningRate();

    for (const agent of this.registry.listAgents()) {
      agent.model.setLearningRate(
        enabled ? learningRate : this.baseLearningRates.get(agent.id) ?? learningRate
      );
    }

    const event: TrainingModeChangedEvent = { enabled, learningRate };
    this.emit(ASSIGNMENT_EVENTS.TRAINING_MODE_CHANGED, event);
    this.logger.info(`Training mode ${enabled ? 'enabled' : 'disabled'} (learning rate ${learningRate})`);
  }

  public toggleTrainingMode(): boolean {
    this.setTrainingMode(!this.trainingMode);
    return this.trainingMode;
  }

  public isTrainingMode(): boolean {
    return this.trainingMode;
  }

  // ==========================================================================
  // Snapshots
  // ==========================================================================

  /**
   * Read-only status of one agent, undefined for an unknown id
   */
  public getAgentStatus(agentId: string): AgentStatusSnapshot | undefined {
    const agent = this.registry.getAgent(agentId);
    if (!agent) {
      return undefined;
    }

    const snapshot = agent.model.snapshot();
    return {
      id: agent.id,
      name: agent.name,
      status: getAgentStatus(agent),
      capabilities: [...agent.capabilities],
      confidence: snapshot.confidence,
      history: snapshot.history,
      adaptabilityScore: snapshot.adaptabilityScore,
      learningRate: snapshot.learningRate,
      load: agent.load,
      tasksCompleted: agent.stats.tasksCompleted,
      tasksFailed: agent.stats.tasksFailed,
      averageSuccessRate: agent.stats.averageSuccessRate,
      overallScore: this.calculateOverallScore(agent),
      expertise: agent.model.getExpertise(),
      lastActivity: agent.lastActivity
    };
  }

  /**
   * Confidence of every agent: agent id → capability → confidence
   */
  public getAllAgentsConfidence(): Record<string, Record<Capability, number>> {
    const result: Record<string, Record<Capability, number>> = {};
    for (const agent of this.registry.listAgents()) {
      result[agent.id] = agent.model.snapshot().confidence;
    }
    return result;
  }

  /**
   * Per-capability outcome counts and expertise for one agent
   *
   * @throws NotFoundError for an unknown agent id
   */
  public getAdaptivityProfile(agentId: string): AdaptivityProfile {
    const agent = this.registry.requireAgent(agentId);
    const snapshot = agent.model.snapshot();

    const history: Record<Capability, CapabilityHistorySummary> = {};
    for (const [capability, outcomes] of Object.entries(snapshot.history)) {
      const success = outcomes.reduce((sum, bit) => sum + bit, 0);
      history[capability] = {
        success,
        fail: outcomes.length - success,
        total: outcomes.length,
        successRate: agent.model.getSuccessRate(capability)
      };
    }

    return {
      capabilities: snapshot.confidence,
      history,
      expertise: agent.model.getExpertise(),
      totalTasks: agent.performanceHistory.length,
      adaptabilityScore: snapshot.adaptabilityScore,
      learningRate: snapshot.learningRate
    };
  }

  public getSystemMetrics(): SystemMetrics {
    const finished = this.totals.completed + this.totals.failed;
    const agents = this.registry.listAgents();
    const busy = agents.filter(agent => agent.load > 0).length;

    return {
      totalTasksCreated: this.totals.created,
      totalTasksCompleted: this.totals.completed,
      totalTasksFailed: this.totals.failed,
      systemEfficiency: finished > 0 ? this.totals.completed / finished : 0,
      agentUtilization: agents.length > 0 ? busy / agents.length : 0,
      averageCompletionTimeMs: finished > 0 ? this.totals.completionTimeMs / finished : 0
    };
  }

  public getIntelligenceMetrics(): IntelligenceMetrics {
    const agents = this.registry.listAgents();
    const confidences = agents
      .filter(agent => agent.model.getCapabilities().length > 0)
      .map(agent => agent.model.getMeanConfidence());
    const adaptabilities = agents.map(agent => agent.model.getAdaptabilityScore());
    const learningEvents = agents.reduce((sum, agent) => sum + agent.performanceHistory.length, 0);

    const averageConfidence = average(confidences);
    const averageAdaptability = average(adaptabilities);
    const systemIntelligence =
      averageConfidence * 0.4 +
      averageAdaptability * 0.4 +
      Math.min(1, learningEvents / LEARNING_EVENTS_SATURATION) * 0.2;

    return {
      averageConfidence,
      averageAdaptability,
      learningEvents,
      systemIntelligence
    };
  }

  public getAssignmentHistory(): AssignmentRecord[] {
    return [...this.assignmentHistory];
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  /**
   * Recent success rate weighted with mean confidence
   */
  private calculateOverallScore(agent: AgentRecord): number {
    if (agent.capabilities.length === 0) {
      return 0;
    }
    return agent.stats.averageSuccessRate * OVERALL_SUCCESS_WEIGHT +
      agent.model.getMeanConfidence() * OVERALL_CONFIDENCE_WEIGHT;
  }

  private currentLearningRate(): number {
    return this.trainingMode
      ? this.config.learning.trainingLearningRate
      : this.config.learning.learningRate;
  }

  private trackTask(task: Task): void {
    this.registry.addTask(task);
    this.totals.created += 1;
  }

  private recordPerformance(
    agent: AgentRecord,
    task: Task,
    success: boolean,
    durationMs: number,
    timestamp: Date
  ): void {
    agent.performanceHistory.push({
      taskId: task.id,
      success,
      complexity: task.complexity,
      capabilities: [...task.requiredCapabilities],
      durationMs,
      timestamp
    });

    if (success) {
      agent.stats.tasksCompleted += 1;
    } else {
      agent.stats.tasksFailed += 1;
    }

    const total = agent.stats.tasksCompleted + agent.stats.tasksFailed;
    agent.stats.averageSuccessRate = total > 0 ? agent.stats.tasksCompleted / total : 0;
  }

  private logCompletion(agent: AgentRecord, task: Task, report: CompletionReport): void {
    this.logger.info(
      `Agent '${agent.name}' completed task '${task.name}' (${report.success ? 'SUCCESS' : 'FAILED'})`,
      { taskId: task.id, agentId: agent.id }
    );

    for (const delta of report.deltas) {
      const sign = delta.delta >= 0 ? '+' : '';
      this.logger.info(
        `  ${delta.capability}: ${delta.before.toFixed(3)} → ${delta.after.toFixed(3)} (${sign}${delta.delta.toFixed(3)})`
      );
    }
  }
}

function assertRange(field: string, value: number, min: number, max: number): void {
  if (!Number.isFinite(value) || value < min || value > max) {
    throw new ValidationError(`${field} must be between ${min} and ${max} (got ${value})`, { [field]: value });
  }
}

function average(values: number[]): number {
  if (values.length === 0) {
    return 0;
  }
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}
