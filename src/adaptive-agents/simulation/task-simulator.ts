/**
 * Task Simulator
 *
 * Drives the assign → complete → learn loop without real workers. Each round creates
 * one task per template, assigns every pending task and resolves the assigned ones
 * with a success draw weighted by the agent's confidence and the task's complexity.
 *
 * @module simulation/task-simulator
 */

import { silentLogger, type ILogger } from '../../core/logger';
import type { AssignmentController } from '../core/assignment-controller';
import { ValidationError } from '../core/errors';
import {
  TaskStatus,
  type AgentRecord,
  type IntelligenceMetrics,
  type SystemMetrics,
  type Task
} from '../core/types';
import { templateToTaskInput, type AgentTemplate, type CapabilityCatalog, type TaskTemplate } from '../catalog';

export type RandomSource = () => number;

export interface TaskOutcome {
  taskId: string;
  taskName: string;
  agentId: string;
  probability: number;
  success: boolean;
}

export interface RoundResult {
  round: number;
  tasksCreated: number;
  tasksAssigned: number;
  tasksUnassigned: number;
  successes: number;
  failures: number;
  outcomes: TaskOutcome[];
}

export interface SimulationSummary {
  rounds: number;
  tasksCreated: number;
  tasksAssigned: number;
  tasksUnassigned: number;
  successes: number;
  failures: number;
  /** Successes / resolved tasks, 0 when nothing resolved */
  successRate: number;
  roundResults: RoundResult[];
  systemMetrics: SystemMetrics;
  intelligenceMetrics: IntelligenceMetrics;
}

export interface TaskSimulatorOptions {
  controller: AssignmentController;
  catalog: CapabilityCatalog;
  /** Uniform source in [0, 1); defaults to Math.random */
  random?: RandomSource;
  logger?: ILogger;
}

/** Success probability lost per point of task complexity */
export const COMPLEXITY_PENALTY = 0.1;

const MS_PER_MINUTE = 60_000;

/**
 * Deterministic uniform source (mulberry32) for reproducible simulations
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Seed 0 means "not seeded"
 */
export function createRandomSource(seed: number): RandomSource {
  return seed > 0 ? createSeededRandom(seed) : Math.random;
}

export class TaskSimulator {
  private readonly controller: AssignmentController;
  private readonly catalog: CapabilityCatalog;
  private readonly random: RandomSource;
  private readonly logger: ILogger;
  private roundsRun = 0;

  constructor(options: TaskSimulatorOptions) {
    this.controller = options.controller;
    this.catalog = options.catalog;
    this.random = options.random ?? Math.random;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Confidence over the required capabilities the agent has, divided by the
   * total required count, scaled down by complexity and floored at 0
   */
  successProbability(agent: AgentRecord, task: Task): number {
    if (task.requiredCapabilities.length === 0) {
      return 0;
    }

    const owned = new Set(agent.capabilities);
    const confidence = task.requiredCapabilities
      .filter(capability => owned.has(capability))
      .reduce((sum, capability) => sum + agent.model.peekConfidence(capability), 0);

    const meanConfidence = confidence / task.requiredCapabilities.length;
    return Math.max(0, meanConfidence * (1 - task.complexity * COMPLEXITY_PENALTY));
  }

  /**
   * Register the catalog's demo agents that are not registered yet (matched by name)
   */
  seedAgents(templates: readonly AgentTemplate[] = this.catalog.demoAgents): AgentRecord[] {
    const existing = new Set(this.controller.listAgents().map(agent => agent.name));
    const registered: AgentRecord[] = [];

    for (const template of templates) {
      if (existing.has(template.name)) {
        continue;
      }
      registered.push(this.controller.registerAgent({
        name: template.name,
        capabilities: template.capabilities
      }));
      existing.add(template.name);
    }

    return registered;
  }

  /**
   * Create one task per template, assign, then resolve this round's assignments
   */
  runRound(templates: readonly TaskTemplate[] = this.catalog.taskTemplates): RoundResult {
    const round = ++this.roundsRun;
    const created = templates.map(template =>
      this.controller.createTask(templateToTaskInput(template, `#${round}`))
    );

    // Includes tasks left over from earlier rounds that can now be placed
    const assignments = this.controller.assignPendingTasks();

    const outcomes: TaskOutcome[] = [];
    for (const assignment of assignments) {
      const task = this.controller.getTask(assignment.taskId);
      const agent = this.controller.getAgent(assignment.agentId);
      if (!task || !agent || task.status !== TaskStatus.ASSIGNED) {
        continue;
      }

      const probability = this.successProbability(agent, task);
      const success = this.random() < probability;
      this.controller.complete(task, success, { durationMs: task.estimatedDuration * MS_PER_MINUTE });

      outcomes.push({
        taskId: task.id,
        taskName: task.name,
        agentId: agent.id,
        probability,
        success
      });
    }

    const successes = outcomes.filter(outcome => outcome.success).length;
    const result: RoundResult = {
      round,
      tasksCreated: created.length,
      tasksAssigned: outcomes.length,
      tasksUnassigned: created.filter(task => task.status === TaskStatus.CREATED).length,
      successes,
      failures: outcomes.length - successes,
      outcomes
    };

    this.logger.info(
      `Round ${round}: ${result.tasksAssigned}/${result.tasksCreated} assigned, ${successes} succeeded`
    );

    return result;
  }

  run(rounds: number, templates: readonly TaskTemplate[] = this.catalog.taskTemplates): SimulationSummary {
    if (!Number.isInteger(rounds) || rounds < 1) {
      throw new ValidationError(`rounds must be a positive integer (got ${rounds})`);
    }

    const roundResults: RoundResult[] = [];
    for (let i = 0; i < rounds; i++) {
      roundResults.push(this.runRound(templates));
    }

    const total = (pick: (result: RoundResult) => number): number =>
      roundResults.reduce((sum, result) => sum + pick(result), 0);

    const successes = total(result => result.successes);
    const failures = total(result => result.failures);

    return {
      rounds,
      tasksCreated: total(result => result.tasksCreated),
      tasksAssigned: total(result => result.tasksAssigned),
      tasksUnassigned: total(result => result.tasksUnassigned),
      successes,
      failures,
      successRate: successes + failures > 0 ? successes / (successes + failures) : 0,
      roundResults,
      systemMetrics: this.controller.getSystemMetrics(),
      intelligenceMetrics: this.controller.getIntelligenceMetrics()
    };
  }
}
