/**
 * Task State Machine
 *
 * Enforces the task lifecycle and keeps a bounded history of transition attempts.
 *
 * State Flow:
 *   CREATED → ASSIGNED → COMPLETED
 *   COMPLETED (terminal state)
 *
 * No transition skips a state. Invalid attempts are recorded and rejected with a
 * UsageError at the point of misuse.
 *
 * @module task-state-machine
 */

import { UsageError } from './errors';
import { TaskStatus, TASK_STATE_TRANSITIONS, type Task } from './types';

/**
 * State transition record for history
 */
export interface TaskTransition {
  taskId: string;
  timestamp: Date;
  from: TaskStatus;
  to: TaskStatus;
  reason: string;
  success: boolean;
  error?: string;
}

/**
 * Transition hook function type
 */
export type TransitionHook = (transition: TaskTransition, task: Task) => void;

/**
 * State machine configuration
 */
export interface StateMachineConfig {
  hooks?: {
    before?: TransitionHook[];
    after?: TransitionHook[];
  };
  maxHistorySize?: number;
}

export class TaskStateMachine {
  /**
   * Valid state transitions map
   */
  private static readonly TRANSITIONS: Map<TaskStatus, TaskStatus[]> = new Map(
    Object.values(TaskStatus).map(
      (state): [TaskStatus, TaskStatus[]] => [state, TASK_STATE_TRANSITIONS[state]]
    )
  );

  private history: TaskTransition[] = [];
  private beforeHooks: TransitionHook[] = [];
  private afterHooks: TransitionHook[] = [];
  private maxHistorySize: number;

  constructor(config: StateMachineConfig = {}) {
    this.maxHistorySize = config.maxHistorySize ?? 500;

    if (config.hooks?.before) {
      this.beforeHooks = [...config.hooks.before];
    }

    if (config.hooks?.after) {
      this.afterHooks = [...config.hooks.after];
    }
  }

  canTransition(task: Pick<Task, 'status'>, targetState: TaskStatus): boolean {
    return this.getAllowedTransitions(task.status).includes(targetState);
  }

  getAllowedTransitions(state: TaskStatus): TaskStatus[] {
    return TaskStateMachine.TRANSITIONS.get(state) ?? [];
  }

  isTerminal(task: Pick<Task, 'status'>): boolean {
    return this.getAllowedTransitions(task.status).length === 0;
  }

  registerBeforeHook(hook: TransitionHook): void {
    this.beforeHooks.push(hook);
  }

  registerAfterHook(hook: TransitionHook): void {
    this.afterHooks.push(hook);
  }

  /**
   * Move a task to the target state
   *
   * @throws UsageError if the transition is not allowed
   * @throws whatever a hook throws, after restoring the previous state
   */
  transition(task: Task, targetState: TaskStatus, reason: string): TaskTransition {
    const previousState = task.status;

    if (!this.canTransition(task, targetState)) {
      const error = this.isTerminal(task)
        ? `Task ${task.id} is already ${previousState}; cannot move to ${targetState}`
        : `Invalid task transition for ${task.id}: ${previousState} → ${targetState}`;

      this.addToHistory({
        taskId: task.id,
        timestamp: new Date(),
        from: previousState,
        to: targetState,
        reason,
        success: false,
        error,
      });

      throw new UsageError(error, { taskId: task.id, from: previousState, to: targetState });
    }

    const transition: TaskTransition = {
      taskId: task.id,
      timestamp: new Date(),
      from: previousState,
      to: targetState,
      reason,
      success: false,
    };

    try {
      this.executeHooks(this.beforeHooks, transition, task);

      task.status = targetState;
      transition.success = true;

      this.executeHooks(this.afterHooks, transition, task);
    } catch (error) {
      // A failed hook leaves the task where it started
      task.status = previousState;
      transition.success = false;
      transition.error = error instanceof Error ? error.message : String(error);
      this.addToHistory(transition);
      throw error;
    }

    this.addToHistory(transition);
    return transition;
  }

  /**
   * Transition history, optionally for one task
   */
  getHistory(taskId?: string): ReadonlyArray<TaskTransition> {
    if (taskId === undefined) {
      return [...this.history];
    }
    return this.history.filter(entry => entry.taskId === taskId);
  }

  clearHistory(): void {
    this.history = [];
  }

  private executeHooks(hooks: TransitionHook[], transition: TaskTransition, task: Task): void {
    for (const hook of hooks) {
      hook(transition, task);
    }
  }

  private addToHistory(transition: TaskTransition): void {
    this.history.push(transition);
    if (this.history.length > this.maxHistorySize) {
      this.history = this.history.slice(-this.maxHistorySize);
    }
  }
}
