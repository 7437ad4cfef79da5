/**
 * Learning Tracker
 *
 * Observes an AssignmentController and keeps a confidence timeline per
 * (agent, capability) pair:
 * - Bounded window of confidence points
 * - Trend detection (improving, declining, stable)
 * - Per-agent learning summaries
 * - Notifications when a trend flips
 *
 * @module tracking/learning-tracker
 */

import { EventEmitter } from 'events';
import { silentLogger, type ILogger } from '../../core/logger';
import {
  ASSIGNMENT_EVENTS,
  type AssignmentController,
  type ConfidenceUpdatedEvent
} from '../core/assignment-controller';
import { UsageError } from '../core/errors';
import type { Capability } from '../core/types';

// ============================================================================
// Type Definitions
// ============================================================================

export type LearningTrend = 'improving' | 'stable' | 'declining';

export interface ConfidencePoint {
  confidence: number;
  outcome: boolean;
  taskId: string;
  timestamp: Date;
}

export interface CapabilityTimeline {
  agentId: string;
  capability: Capability;
  points: ConfidencePoint[];
  /** Updates recorded, including those that fell out of the window */
  observations: number;
  trend: LearningTrend;
}

export interface AgentLearningSummary {
  agentId: string;
  capabilities: Array<{
    capability: Capability;
    current: number;
    change: number;
    trend: LearningTrend;
    observations: number;
  }>;
  improving: Capability[];
  declining: Capability[];
}

export interface TrendChangedEvent {
  agentId: string;
  capability: Capability;
  previous: LearningTrend;
  current: LearningTrend;
}

export interface LearningTrackerOptions {
  /** Points kept per (agent, capability) pair */
  windowSize?: number;
  /** Minimum change across the window to count as a trend */
  trendThreshold?: number;
  logger?: ILogger;
}

export const DEFAULT_WINDOW_SIZE = 20;
export const DEFAULT_TREND_THRESHOLD = 0.01;

// ============================================================================
// Learning Tracker Class
// ============================================================================

export class LearningTracker extends EventEmitter {
  private timelines: Map<string, CapabilityTimeline> = new Map();
  private controller: AssignmentController | null = null;
  private readonly windowSize: number;
  private readonly trendThreshold: number;
  private readonly logger: ILogger;
  private readonly onConfidenceUpdated = (event: ConfidenceUpdatedEvent): void => {
    this.record(event);
  };

  constructor(options: LearningTrackerOptions = {}) {
    super();
    this.windowSize = Math.max(2, options.windowSize ?? DEFAULT_WINDOW_SIZE);
    this.trendThreshold = options.trendThreshold ?? DEFAULT_TREND_THRESHOLD;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Start listening to confidence updates from a controller
   */
  attach(controller: AssignmentController): void {
    if (this.controller) {
      throw new UsageError('LearningTracker is already attached to a controller');
    }
    controller.on(ASSIGNMENT_EVENTS.CONFIDENCE_UPDATED, this.onConfidenceUpdated);
    this.controller = controller;
  }

  detach(): void {
    if (!this.controller) {
      return;
    }
    this.controller.off(ASSIGNMENT_EVENTS.CONFIDENCE_UPDATED, this.onConfidenceUpdated);
    this.controller = null;
  }

  isAttached(): boolean {
    return this.controller !== null;
  }

  /**
   * Append a confidence point and re-evaluate the pair's trend
   */
  record(event: ConfidenceUpdatedEvent): CapabilityTimeline {
    const key = timelineKey(event.agentId, event.capability);
    let timeline = this.timelines.get(key);

    if (!timeline) {
      timeline = {
        agentId: event.agentId,
        capability: event.capability,
        // Seed with the pre-update value so the first update already has a direction
        points: [{
          confidence: event.before,
          outcome: event.outcome,
          taskId: event.taskId,
          timestamp: event.timestamp
        }],
        observations: 0,
        trend: 'stable'
      };
      this.timelines.set(key, timeline);
    }

    timeline.points.push({
      confidence: event.after,
      outcome: event.outcome,
      taskId: event.taskId,
      timestamp: event.timestamp
    });
    timeline.observations += 1;
    if (timeline.points.length > this.windowSize) {
      timeline.points = timeline.points.slice(-this.windowSize);
    }

    const previous = timeline.trend;
    timeline.trend = this.calculateTrend(timeline.points);

    if (timeline.trend !== previous) {
      const changed: TrendChangedEvent = {
        agentId: event.agentId,
        capability: event.capability,
        previous,
        current: timeline.trend
      };
      this.emit('trend:changed', changed);
      this.logger.debug(`${event.agentId}/${event.capability} is now ${timeline.trend}`);
    }

    return timeline;
  }

  getTimeline(agentId: string, capability: Capability): CapabilityTimeline | undefined {
    const timeline = this.timelines.get(timelineKey(agentId, capability));
    if (!timeline) {
      return undefined;
    }
    return { ...timeline, points: [...timeline.points] };
  }

  getTrend(agentId: string, capability: Capability): LearningTrend {
    return this.timelines.get(timelineKey(agentId, capability))?.trend ?? 'stable';
  }

  /**
   * Change across the window and trend for every capability the agent has used
   */
  getAgentSummary(agentId: string): AgentLearningSummary {
    const capabilities: AgentLearningSummary['capabilities'] = [];

    for (const timeline of this.timelines.values()) {
      if (timeline.agentId !== agentId) {
        continue;
      }
      const first = timeline.points[0];
      const last = timeline.points[timeline.points.length - 1];
      if (!first || !last) {
        continue;
      }
      capabilities.push({
        capability: timeline.capability,
        current: last.confidence,
        change: last.confidence - first.confidence,
        trend: timeline.trend,
        observations: timeline.observations
      });
    }

    capabilities.sort((a, b) => a.capability.localeCompare(b.capability));

    return {
      agentId,
      capabilities,
      improving: capabilities.filter(entry => entry.trend === 'improving').map(entry => entry.capability),
      declining: capabilities.filter(entry => entry.trend === 'declining').map(entry => entry.capability)
    };
  }

  clear(): void {
    this.timelines.clear();
  }

  private calculateTrend(points: ConfidencePoint[]): LearningTrend {
    const first = points[0];
    const last = points[points.length - 1];
    if (!first || !last || points.length < 2) {
      return 'stable';
    }

    const change = last.confidence - first.confidence;
    if (change > this.trendThreshold) {
      return 'improving';
    }
    if (change < -this.trendThreshold) {
      return 'declining';
    }
    return 'stable';
  }
}

function timelineKey(agentId: string, capability: Capability): string {
  return `${agentId}\u0000${capability}`;
}
