/**
 * Integration Tests for the adaptive assignment loop
 *
 * Tests the complete flow:
 * - Registration → assignment → completion → confidence update
 * - Experience changing later assignments
 * - Tracker observing the controller
 * - Reproducible seeded simulations over the bundled catalog
 */

import { describe, expect, it, beforeEach } from '@jest/globals';
import {
  AgentScorer,
  AssignmentController,
  ConfidenceModel,
  LearningTracker,
  TaskSimulator,
  createSeededRandom,
  loadCatalog,
  silentLogger,
  type SimulationSummary
} from '../../../src/adaptive-agents';

describe('Adaptive assignment loop', () => {
  let controller: AssignmentController;

  beforeEach(() => {
    controller = new AssignmentController({ logger: silentLogger });
  });

  function runTask(capabilities: string[], success: boolean): string {
    const task = controller.createTask({ name: 'Task', requiredCapabilities: capabilities });
    const agentId = controller.assignOrThrow(task);
    controller.complete(task, success);
    return agentId;
  }

  it('should learn from consecutive outcomes', () => {
    controller.registerAgent({ name: 'Quantum Analyst', capabilities: ['data_analysis', 'visualization'] });

    runTask(['data_analysis'], true);
    let status = controller.getAgentStatus('agent-1');
    expect(status?.confidence.data_analysis).toBeCloseTo(0.55, 10);
    expect(status?.history.data_analysis).toEqual([1]);

    runTask(['data_analysis'], false);
    status = controller.getAgentStatus('agent-1');
    expect(status?.confidence.data_analysis).toBeCloseTo(0.495, 10);
    expect(status?.history.data_analysis).toEqual([1, 0]);
    expect(status?.confidence.visualization).toBe(0.5);
  });

  it('should bound the outcome history to ten entries', () => {
    controller.registerAgent({ name: 'Agent', capabilities: ['x'] });
    for (let i = 0; i < 11; i++) {
      runTask(['x'], true);
    }
    expect(controller.getAgentStatus('agent-1')?.history.x).toHaveLength(10);
  });

  it('should route work away from an agent that keeps failing', () => {
    controller.registerAgent({ id: 'agent-a', name: 'A', capabilities: ['x'] });
    controller.registerAgent({ id: 'agent-b', name: 'B', capabilities: ['x'] });

    expect(runTask(['x'], false)).toBe('agent-a');
    expect(runTask(['x'], true)).toBe('agent-b');
    expect(runTask(['x'], true)).toBe('agent-b');
  });

  it('should score a perfect agent 1.0, ahead of a newcomer', () => {
    const scorer = new AgentScorer();
    const veteran = new ConfidenceModel({ learningRate: 1, capabilities: ['x', 'y'] });
    veteran.update('x', true);
    veteran.update('y', true);

    const task = { id: 'task-1', requiredCapabilities: ['x', 'y'] };
    const ranked = scorer.rankAgents(
      [
        { id: 'newcomer', capabilities: ['x', 'y'], model: new ConfidenceModel({ capabilities: ['x', 'y'] }), load: 0 },
        { id: 'veteran', capabilities: ['x', 'y'], model: veteran, load: 0 }
      ],
      task
    );

    expect(ranked[0]?.agentId).toBe('veteran');
    expect(ranked[0]?.totalScore).toBeCloseTo(1, 10);
  });

  it('should let a tracker follow the controller', () => {
    const tracker = new LearningTracker();
    tracker.attach(controller);
    controller.registerAgent({ name: 'Agent', capabilities: ['x'] });

    runTask(['x'], true);
    runTask(['x'], true);

    expect(tracker.getAgentSummary('agent-1').improving).toEqual(['x']);
    tracker.detach();
  });

  describe('Seeded simulation', () => {
    function simulate(seed: number): { summary: SimulationSummary; confidence: Record<string, Record<string, number>> } {
      const stack = new AssignmentController({ logger: silentLogger });
      const simulator = new TaskSimulator({
        controller: stack,
        catalog: loadCatalog(),
        random: createSeededRandom(seed)
      });
      simulator.seedAgents();
      return { summary: simulator.run(5), confidence: stack.getAllAgentsConfidence() };
    }

    it('should reproduce the same run for the same seed', () => {
      const first = simulate(7);
      const second = simulate(7);

      const outcomes = (summary: SimulationSummary) =>
        summary.roundResults.flatMap(round => round.outcomes.map(outcome => [outcome.taskName, outcome.agentId, outcome.success]));

      expect(outcomes(first.summary)).toEqual(outcomes(second.summary));
      expect(first.confidence).toEqual(second.confidence);
    });

    it('should place every bundled template with the demo roster', () => {
      const { summary } = simulate(3);

      expect(summary.tasksCreated).toBe(25);
      expect(summary.tasksAssigned).toBe(25);
      expect(summary.tasksUnassigned).toBe(0);
      expect(summary.successes + summary.failures).toBe(25);
      expect(summary.intelligenceMetrics.learningEvents).toBe(25);
    });
  });
});
