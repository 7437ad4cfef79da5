/**
 * Agent Registry
 *
 * Repository of agents and tasks owned by an assignment controller. Every
 * operation receives it explicitly; there is no module-level pool.
 */

import { NotFoundError, ValidationError } from './errors';
import type { AgentRecord, Task } from './types';

export class AgentRegistry {
  private agents: Map<string, AgentRecord> = new Map();
  private tasks: Map<string, Task> = new Map();
  private agentSequence = 0;
  private taskSequence = 0;

  addAgent(agent: AgentRecord): AgentRecord {
    if (this.agents.has(agent.id)) {
      throw new ValidationError(`Agent already registered: ${agent.id}`, { agentId: agent.id });
    }
    this.agents.set(agent.id, agent);
    return agent;
  }

  getAgent(agentId: string): AgentRecord | undefined {
    return this.agents.get(agentId);
  }

  requireAgent(agentId: string): AgentRecord {
    const agent = this.agents.get(agentId);
    if (!agent) {
      throw new NotFoundError(`Agent not found: ${agentId}`, { agentId });
    }
    return agent;
  }

  hasAgent(agentId: string): boolean {
    return this.agents.has(agentId);
  }

  /**
   * All agents ordered by id
   */
  listAgents(): AgentRecord[] {
    return Array.from(this.agents.values()).sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
  }

  get agentCount(): number {
    return this.agents.size;
  }

  addTask(task: Task): Task {
    if (this.tasks.has(task.id)) {
      throw new ValidationError(`Task already exists: ${task.id}`, { taskId: task.id });
    }
    this.tasks.set(task.id, task);
    return task;
  }

  getTask(taskId: string): Task | undefined {
    return this.tasks.get(taskId);
  }

  requireTask(taskId: string): Task {
    const task = this.tasks.get(taskId);
    if (!task) {
      throw new NotFoundError(`Task not found: ${taskId}`, { taskId });
    }
    return task;
  }

  /**
   * All tasks in creation order
   */
  listTasks(): Task[] {
    return Array.from(this.tasks.values());
  }

  get taskCount(): number {
    return this.tasks.size;
  }

  /**
   * Next free generated agent id (agent-1, agent-2, ...)
   */
  nextAgentId(): string {
    let id: string;
    do {
      id = `agent-${++this.agentSequence}`;
    } while (this.agents.has(id));
    return id;
  }

  nextTaskId(): string {
    let id: string;
    do {
      id = `task-${++this.taskSequence}`;
    } while (this.tasks.has(id));
    return id;
  }
}
