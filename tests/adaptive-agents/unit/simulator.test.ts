/**
 * Unit Tests for the Task Simulator
 */

import { describe, expect, it, beforeEach } from '@jest/globals';
import { parseCatalog, type CapabilityCatalog } from '../../../src/adaptive-agents/catalog';
import { AssignmentController } from '../../../src/adaptive-agents/core/assignment-controller';
import { ValidationError } from '../../../src/adaptive-agents/core/errors';
import {
  TaskSimulator,
  createRandomSource,
  createSeededRandom
} from '../../../src/adaptive-agents/simulation/task-simulator';
import { silentLogger } from '../../../src/core/logger';

const catalog: CapabilityCatalog = parseCatalog({
  capabilities: ['data_analysis', 'visualization', 'quantum'],
  taskTemplates: [
    {
      name: 'Audit',
      description: 'Review the numbers',
      requiredCapabilities: ['data_analysis'],
      complexity: 2,
      priority: 5,
      estimatedDuration: 10
    },
    {
      name: 'Entangle',
      requiredCapabilities: ['quantum'],
      complexity: 2,
      priority: 3,
      estimatedDuration: 10
    }
  ],
  demoAgents: [
    { name: 'Analyst', capabilities: ['data_analysis', 'visualization'] }
  ]
});

describe('TaskSimulator', () => {
  let controller: AssignmentController;

  beforeEach(() => {
    controller = new AssignmentController({ logger: silentLogger });
  });

  function simulator(random: () => number): TaskSimulator {
    return new TaskSimulator({ controller, catalog, random });
  }

  describe('successProbability', () => {
    it('should scale confidence by complexity', () => {
      const agent = controller.registerAgent({ name: 'Agent', capabilities: ['a'] });
      const task = controller.createTask({ name: 'Task', requiredCapabilities: ['a'], complexity: 1 });
      expect(simulator(() => 0).successProbability(agent, task)).toBeCloseTo(0.45, 10);
    });

    it('should count only possessed capabilities over the full requirement', () => {
      const agent = controller.registerAgent({ name: 'Agent', capabilities: ['a'] });
      const task = controller.createTask({ name: 'Task', requiredCapabilities: ['a', 'b'], complexity: 5 });
      expect(simulator(() => 0).successProbability(agent, task)).toBeCloseTo(0.125, 10);
    });

    it('should floor at 0 for maximal complexity', () => {
      const agent = controller.registerAgent({ name: 'Agent', capabilities: ['a'] });
      const task = controller.createTask({ name: 'Task', requiredCapabilities: ['a'], complexity: 10 });
      expect(simulator(() => 0).successProbability(agent, task)).toBe(0);
    });
  });

  describe('Rounds', () => {
    it('should register demo agents once', () => {
      const sim = simulator(() => 0);
      expect(sim.seedAgents().map(agent => agent.name)).toEqual(['Analyst']);
      expect(sim.seedAgents()).toEqual([]);
    });

    it('should resolve assigned tasks with the random source', () => {
      const sim = simulator(() => 0);
      sim.seedAgents();

      const result = sim.runRound();

      expect(result.round).toBe(1);
      expect(result.tasksCreated).toBe(2);
      expect(result.tasksAssigned).toBe(1);
      expect(result.tasksUnassigned).toBe(1);
      expect(result.successes).toBe(1);
      expect(result.failures).toBe(0);
      expect(result.outcomes[0]?.taskName).toBe('Audit #1');
      expect(result.outcomes[0]?.probability).toBeCloseTo(0.4, 10);
      expect(controller.getAllAgentsConfidence()['agent-1']?.data_analysis).toBeCloseTo(0.55, 10);
      expect(controller.getAgent('agent-1')?.load).toBe(0);
    });

    it('should fail every draw above the success probability', () => {
      const sim = simulator(() => 0.99);
      sim.seedAgents();

      const result = sim.runRound();

      expect(result.successes).toBe(0);
      expect(result.failures).toBe(1);
      expect(controller.getAllAgentsConfidence()['agent-1']?.data_analysis).toBeCloseTo(0.45, 10);
    });

    it('should total a multi-round run', () => {
      const sim = simulator(() => 0);
      sim.seedAgents();

      const summary = sim.run(2);

      expect(summary.rounds).toBe(2);
      expect(summary.tasksCreated).toBe(4);
      expect(summary.tasksAssigned).toBe(2);
      expect(summary.tasksUnassigned).toBe(2);
      expect(summary.successes).toBe(2);
      expect(summary.successRate).toBe(1);
      expect(summary.roundResults.map(result => result.round)).toEqual([1, 2]);
      expect(summary.systemMetrics.totalTasksCreated).toBe(4);
      expect(summary.systemMetrics.averageCompletionTimeMs).toBe(600_000);
      expect(summary.intelligenceMetrics.learningEvents).toBe(2);
    });

    it('should reject a non-positive round count', () => {
      expect(() => simulator(() => 0).run(0)).toThrow(ValidationError);
    });
  });

  describe('Random sources', () => {
    it('should repeat a seeded sequence', () => {
      const first = createSeededRandom(42);
      const second = createSeededRandom(42);
      const a = [first(), first(), first()];
      const b = [second(), second(), second()];

      expect(a).toEqual(b);
      for (const value of a) {
        expect(value).toBeGreaterThanOrEqual(0);
        expect(value).toBeLessThan(1);
      }
    });

    it('should differ between seeds', () => {
      expect(createSeededRandom(1)()).not.toBe(createSeededRandom(2)());
    });

    it('should use Math.random for seed 0', () => {
      expect(createRandomSource(0)).toBe(Math.random);
    });
  });
});
