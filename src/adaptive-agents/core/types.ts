/**
 * Adaptive Agents - Core Types
 *
 * Agents, tasks, lifecycle states and the read-only snapshots exposed to
 * collaborators such as the CLI or a dashboard.
 */

import type { ConfidenceModel, ConfidenceUpdate } from '../learning/confidence-model';
import type { ScoreBreakdown } from '../scoring/agent-scorer';

/**
 * Capability identifier drawn from an open vocabulary.
 * Always stored in the form produced by {@link normalizeCapability}.
 */
export type Capability = string;

/**
 * Task lifecycle
 *
 * CREATED → ASSIGNED (agent selected)
 * ASSIGNED → COMPLETED (outcome reported)
 * COMPLETED is terminal
 */
export enum TaskStatus {
  CREATED = 'CREATED',
  ASSIGNED = 'ASSIGNED',
  COMPLETED = 'COMPLETED'
}

/**
 * Valid state transitions for the task lifecycle
 */
export const TASK_STATE_TRANSITIONS: Record<TaskStatus, TaskStatus[]> = {
  [TaskStatus.CREATED]: [TaskStatus.ASSIGNED],
  [TaskStatus.ASSIGNED]: [TaskStatus.COMPLETED],
  [TaskStatus.COMPLETED]: []
};

/**
 * Agent status, derived from load
 */
export enum AgentStatus {
  IDLE = 'IDLE',
  BUSY = 'BUSY'
}

/**
 * Unit of work with capability requirements
 */
export interface Task {
  id: string;
  name: string;
  description: string;
  requiredCapabilities: Capability[];
  /** 1-10, higher is assigned first in batch assignment */
  priority: number;
  /** 1-10 */
  complexity: number;
  /** Minutes */
  estimatedDuration: number;
  status: TaskStatus;
  assignedAgentId?: string;
  score?: number;
  outcome?: boolean;
  createdAt: Date;
  assignedAt?: Date;
  completedAt?: Date;
  metadata: Record<string, unknown>;
}

export interface CreateTaskInput {
  id?: string;
  name: string;
  description?: string;
  requiredCapabilities: string[];
  priority?: number;
  complexity?: number;
  estimatedDuration?: number;
  metadata?: Record<string, unknown>;
}

/**
 * Outcome record kept per completed task
 */
export interface PerformanceRecord {
  taskId: string;
  success: boolean;
  complexity: number;
  capabilities: Capability[];
  durationMs: number;
  timestamp: Date;
}

export interface AgentStats {
  tasksCompleted: number;
  tasksFailed: number;
  averageSuccessRate: number;
}

/**
 * Agent with its learned confidence model and availability signal
 */
export interface AgentRecord {
  id: string;
  name: string;
  capabilities: Capability[];
  model: ConfidenceModel;
  /** Number of in-flight tasks */
  load: number;
  stats: AgentStats;
  performanceHistory: PerformanceRecord[];
  createdAt: Date;
  lastActivity: Date;
}

export interface RegisterAgentInput {
  id?: string;
  name: string;
  capabilities: string[];
  /** Rate used outside training mode; defaults to the configured rate */
  learningRate?: number;
}

export interface AssignmentRecord {
  taskId: string;
  agentId: string;
  score: number;
  breakdown: ScoreBreakdown;
  timestamp: Date;
}

export interface CompletionReport {
  taskId: string;
  agentId: string;
  success: boolean;
  deltas: ConfidenceUpdate[];
  durationMs: number;
  completedAt: Date;
}

/**
 * Read-only snapshot of a single agent
 */
export interface AgentStatusSnapshot {
  id: string;
  name: string;
  status: AgentStatus;
  capabilities: Capability[];
  confidence: Record<Capability, number>;
  history: Record<Capability, number[]>;
  adaptabilityScore: number;
  learningRate: number;
  load: number;
  tasksCompleted: number;
  tasksFailed: number;
  averageSuccessRate: number;
  overallScore: number;
  expertise: Capability[];
  lastActivity: Date;
}

export interface CapabilityHistorySummary {
  success: number;
  fail: number;
  total: number;
  successRate: number;
}

export interface AdaptivityProfile {
  capabilities: Record<Capability, number>;
  history: Record<Capability, CapabilityHistorySummary>;
  expertise: Capability[];
  totalTasks: number;
  adaptabilityScore: number;
  learningRate: number;
}

export interface SystemMetrics {
  totalTasksCreated: number;
  totalTasksCompleted: number;
  totalTasksFailed: number;
  /** Successful / finished tasks */
  systemEfficiency: number;
  /** Busy agents / agents */
  agentUtilization: number;
  averageCompletionTimeMs: number;
}

export interface IntelligenceMetrics {
  averageConfidence: number;
  averageAdaptability: number;
  learningEvents: number;
  systemIntelligence: number;
}

/**
 * Normalize a capability token (trim + lower-case)
 */
export function normalizeCapability(capability: string): Capability {
  return capability.trim().toLowerCase();
}

/**
 * Normalize and de-duplicate a capability list, keeping first-seen order
 */
export function normalizeCapabilities(capabilities: readonly string[]): Capability[] {
  const seen = new Set<Capability>();
  for (const capability of capabilities) {
    const normalized = normalizeCapability(capability);
    if (normalized !== '') {
      seen.add(normalized);
    }
  }
  return Array.from(seen);
}

export function getAgentStatus(agent: Pick<AgentRecord, 'load'>): AgentStatus {
  return agent.load > 0 ? AgentStatus.BUSY : AgentStatus.IDLE;
}
