/**
 * Unit Tests for the Learning Tracker
 */

import { describe, expect, it, beforeEach } from '@jest/globals';
import { AssignmentController } from '../../../src/adaptive-agents/core/assignment-controller';
import { UsageError } from '../../../src/adaptive-agents/core/errors';
import { LearningTracker, type TrendChangedEvent } from '../../../src/adaptive-agents/tracking/learning-tracker';
import { silentLogger } from '../../../src/core/logger';

describe('LearningTracker', () => {
  let controller: AssignmentController;
  let tracker: LearningTracker;

  function runTask(success: boolean): void {
    const task = controller.createTask({ name: 'Task', requiredCapabilities: ['x'] });
    controller.assignOrThrow(task);
    controller.complete(task, success);
  }

  beforeEach(() => {
    controller = new AssignmentController({ logger: silentLogger });
    controller.registerAgent({ name: 'Agent', capabilities: ['x'] });
    tracker = new LearningTracker();
    tracker.attach(controller);
  });

  describe('Trends', () => {
    it('should follow confidence through improving, stable and declining', () => {
      const changes: Array<[string, string]> = [];
      tracker.on('trend:changed', (event: TrendChangedEvent) => changes.push([event.previous, event.current]));

      runTask(true);
      expect(tracker.getTrend('agent-1', 'x')).toBe('improving');

      runTask(false);
      expect(tracker.getTrend('agent-1', 'x')).toBe('stable');

      runTask(false);
      expect(tracker.getTrend('agent-1', 'x')).toBe('declining');

      expect(changes).toEqual([
        ['stable', 'improving'],
        ['improving', 'stable'],
        ['stable', 'declining']
      ]);
    });

    it('should report stable for pairs it has not seen', () => {
      expect(tracker.getTrend('agent-1', 'never')).toBe('stable');
      expect(tracker.getTimeline('agent-1', 'never')).toBeUndefined();
    });
  });

  describe('Timelines', () => {
    it('should start each timeline at the pre-update confidence', () => {
      runTask(true);

      const points = tracker.getTimeline('agent-1', 'x')?.points ?? [];
      expect(points).toHaveLength(2);
      expect(points[0]?.confidence).toBe(0.5);
      expect(points[1]?.confidence).toBeCloseTo(0.55, 10);
      expect(points[1]?.outcome).toBe(true);
      expect(tracker.getTimeline('agent-1', 'x')?.observations).toBe(1);
    });

    it('should keep only the configured window', () => {
      const windowed = new LearningTracker({ windowSize: 2 });
      const timestamp = new Date('2024-01-01T00:00:00.000Z');

      windowed.record({
        agentId: 'a', capability: 'x', before: 0.5, after: 0.55, delta: 0.05, outcome: true, taskId: 't1', timestamp
      });
      windowed.record({
        agentId: 'a', capability: 'x', before: 0.55, after: 0.6, delta: 0.05, outcome: true, taskId: 't2', timestamp
      });

      const timeline = windowed.getTimeline('a', 'x');
      expect(timeline?.points.map(point => point.confidence)).toEqual([0.55, 0.6]);
      expect(timeline?.observations).toBe(2);
      expect(timeline?.trend).toBe('improving');
    });

    it('should summarize an agent across capabilities', () => {
      runTask(true);
      runTask(false);
      runTask(false);

      const summary = tracker.getAgentSummary('agent-1');

      expect(summary.capabilities).toHaveLength(1);
      expect(summary.capabilities[0]?.capability).toBe('x');
      expect(summary.capabilities[0]?.current).toBeCloseTo(0.4455, 10);
      expect(summary.capabilities[0]?.change).toBeCloseTo(-0.0545, 10);
      expect(summary.capabilities[0]?.observations).toBe(3);
      expect(summary.declining).toEqual(['x']);
      expect(summary.improving).toEqual([]);
    });
  });

  describe('Attachment', () => {
    it('should refuse a second controller', () => {
      expect(() => tracker.attach(new AssignmentController({ logger: silentLogger }))).toThrow(UsageError);
    });

    it('should stop recording after detach', () => {
      tracker.detach();
      expect(tracker.isAttached()).toBe(false);

      runTask(true);

      expect(tracker.getTimeline('agent-1', 'x')).toBeUndefined();
    });

    it('should clear recorded timelines', () => {
      runTask(true);
      tracker.clear();
      expect(tracker.getTimeline('agent-1', 'x')).toBeUndefined();
    });
  });
});
