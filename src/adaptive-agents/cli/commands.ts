/**
 * Adaptive Agents - CLI Commands
 *
 * Simulation, one-off scoring and configuration inspection.
 *
 * @module adaptive-agents/cli/commands
 */

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import Table from 'cli-table3';
import ora from 'ora';
import { Logger } from '../../core/logger';
import { loadCatalog, DEFAULT_CATALOG_PATH } from '../catalog';
import { AssignmentController } from '../core/assignment-controller';
import {
  AdaptiveConfigManager,
  type AdaptiveConfig,
  type AdaptiveConfigOverrides
} from '../core/config-manager';
import { describeError } from '../core/errors';
import { normalizeCapabilities } from '../core/types';
import { ConfidenceModel } from '../learning/confidence-model';
import { AgentScorer } from '../scoring/agent-scorer';
import { createRandomSource, TaskSimulator, type SimulationSummary } from '../simulation/task-simulator';
import { LearningTracker, type LearningTrend } from '../tracking/learning-tracker';

export const CLI_VERSION = '0.1.0';

interface SimulateOptions {
  rounds?: number;
  seed?: number;
  training?: boolean;
  catalog: string;
  verbose?: boolean;
}

interface ScoreOptions {
  agentCaps: string[];
  taskCaps: string[];
  load: number;
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

function parseCapabilityList(value: string): string[] {
  const capabilities = normalizeCapabilities(value.split(','));
  if (capabilities.length === 0) {
    throw new InvalidArgumentError('Expected a comma-separated list of capabilities.');
  }
  return capabilities;
}

function formatPercent(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

function formatConfidence(value: number): string {
  const text = value.toFixed(3);
  if (value >= 0.7) return chalk.green(text);
  if (value >= 0.4) return chalk.yellow(text);
  return chalk.red(text);
}

function formatTrend(trend: LearningTrend): string {
  switch (trend) {
    case 'improving':
      return chalk.green('▲ improving');
    case 'declining':
      return chalk.red('▼ declining');
    default:
      return chalk.dim('● stable');
  }
}

function fail(error: unknown): never {
  console.error(chalk.red('\nError:'), describeError(error));
  process.exit(1);
}

function printSummary(summary: SimulationSummary): void {
  console.log(chalk.bold.cyan(`\n📊 Simulation (${summary.rounds} rounds)\n`));

  const results = new Table({
    head: [chalk.cyan('Round'), chalk.cyan('Created'), chalk.cyan('Assigned'), chalk.cyan('Succeeded'), chalk.cyan('Failed')]
  });
  for (const round of summary.roundResults) {
    results.push([
      round.round.toString(),
      round.tasksCreated.toString(),
      round.tasksAssigned.toString(),
      chalk.green(round.successes.toString()),
      chalk.red(round.failures.toString())
    ]);
  }
  console.log(results.toString());

  const metrics = new Table({
    chars: { 'mid': '', 'left-mid': '', 'mid-mid': '', 'right-mid': '' }
  });
  metrics.push(
    ['Success rate', formatPercent(summary.successRate)],
    ['Unassigned tasks', summary.tasksUnassigned.toString()],
    ['System efficiency', formatPercent(summary.systemMetrics.systemEfficiency)],
    ['Average confidence', summary.intelligenceMetrics.averageConfidence.toFixed(3)],
    ['Average adaptability', summary.intelligenceMetrics.averageAdaptability.toFixed(3)],
    ['Learning events', summary.intelligenceMetrics.learningEvents.toString()],
    ['System intelligence', summary.intelligenceMetrics.systemIntelligence.toFixed(3)]
  );
  console.log(chalk.bold('\nMetrics'));
  console.log(metrics.toString());
}

function printConfidence(controller: AssignmentController, tracker: LearningTracker): void {
  const table = new Table({
    head: [
      chalk.cyan('Agent'),
      chalk.cyan('Capability'),
      chalk.cyan('Confidence'),
      chalk.cyan('Recent success'),
      chalk.cyan('Trend')
    ]
  });

  for (const agent of controller.listAgents()) {
    for (const capability of agent.model.getCapabilities()) {
      table.push([
        agent.name,
        capability,
        formatConfidence(agent.model.peekConfidence(capability)),
        formatPercent(agent.model.getSuccessRate(capability)),
        formatTrend(tracker.getTrend(agent.id, capability))
      ]);
    }
  }

  console.log(chalk.bold('\nConfidence'));
  console.log(table.toString());
}

/**
 * Create simulate command
 */
export function createSimulateCommand(): Command {
  return new Command('simulate')
    .description('Run the demo roster through simulated task rounds')
    .option('-r, --rounds <n>', 'Number of rounds', parseInteger)
    .option('-s, --seed <n>', 'Random seed (0 = unseeded)', parseInteger)
    .option('-t, --training', 'Use the accelerated training learning rate')
    .option('-c, --catalog <file>', 'Capability catalog file', DEFAULT_CATALOG_PATH)
    .option('-v, --verbose', 'Log every assignment and confidence update')
    .action((options: SimulateOptions) => {
      const overrides: AdaptiveConfigOverrides = {
        simulation: { rounds: options.rounds, seed: options.seed },
        learning: { trainingMode: options.training }
      };
      const config = AdaptiveConfigManager.getInstance().loadConfig(overrides);

      const spinner = ora('Running simulation...').start();

      try {
        const catalog = loadCatalog(options.catalog);
        const logger = new Logger(
          { ...config.logging, level: options.verbose ? 'debug' : 'warn' },
          { prefix: 'simulate' }
        );
        const controller = new AssignmentController({ config, logger: logger.child('controller') });
        const tracker = new LearningTracker({ logger: logger.child('tracker') });
        tracker.attach(controller);

        const simulator = new TaskSimulator({
          controller,
          catalog,
          random: createRandomSource(config.simulation.seed),
          logger
        });

        simulator.seedAgents();
        const summary = simulator.run(config.simulation.rounds);
        tracker.detach();

        spinner.succeed(chalk.green(`Simulation complete${controller.isTrainingMode() ? ' (training mode)' : ''}`));

        printSummary(summary);
        printConfidence(controller, tracker);
        console.log();
      } catch (error) {
        spinner.fail(chalk.red('Simulation failed'));
        fail(error);
      }
    });
}

/**
 * Create score command
 */
export function createScoreCommand(): Command {
  return new Command('score')
    .description('Score a fresh agent against a task')
    .requiredOption('-a, --agent-caps <list>', 'Agent capabilities (comma-separated)', parseCapabilityList)
    .requiredOption('-t, --task-caps <list>', 'Required task capabilities (comma-separated)', parseCapabilityList)
    .option('-l, --load <n>', 'Agent load', parseInteger, 0)
    .action((options: ScoreOptions) => {
      try {
        const scorer = new AgentScorer();
        const result = scorer.calculateScore(
          {
            id: 'agent',
            capabilities: options.agentCaps,
            model: new ConfidenceModel({ capabilities: options.agentCaps }),
            load: options.load
          },
          { id: 'task', requiredCapabilities: options.taskCaps }
        );
        const weights = scorer.getWeights();

        console.log(chalk.bold.cyan(`\n🎯 Score: ${result.totalScore.toFixed(3)}\n`));

        const table = new Table({
          head: [chalk.cyan('Factor'), chalk.cyan('Value'), chalk.cyan('Weight')]
        });
        table.push(
          ['Capability match', result.breakdown.capabilityMatch.toFixed(3), weights.capabilityMatch.toFixed(2)],
          ['Confidence', result.breakdown.confidence.toFixed(3), weights.confidence.toFixed(2)],
          ['Success rate', result.breakdown.successRate.toFixed(3), weights.successRate.toFixed(2)],
          ['Availability', result.breakdown.availability.toFixed(3), weights.availability.toFixed(2)]
        );
        console.log(table.toString());
        console.log(chalk.dim(result.matchReason));
        console.log();
      } catch (error) {
        fail(error);
      }
    });
}

function printConfig(config: AdaptiveConfig): void {
  const table = new Table({
    head: [chalk.cyan('Key'), chalk.cyan('Value')]
  });

  for (const [section, values] of Object.entries(config)) {
    for (const [key, value] of Object.entries(values)) {
      table.push([`${section}.${key}`, String(value)]);
    }
  }

  console.log(table.toString());
}

/**
 * Create config command
 */
export function createConfigCommand(): Command {
  const configCommand = new Command('config').description('Inspect resolved configuration');

  configCommand
    .command('show')
    .description('Print the resolved configuration')
    .action(() => {
      const manager = AdaptiveConfigManager.getInstance();
      const config = manager.loadConfig();

      console.log(chalk.bold.cyan('\n⚙️  Configuration\n'));
      console.log(chalk.dim('Source:'), manager.getConfigFilePath() ?? 'defaults + environment');
      printConfig(config);
      console.log();
    });

  configCommand
    .command('validate')
    .description('Validate the resolved configuration')
    .action(() => {
      const manager = AdaptiveConfigManager.getInstance();
      manager.loadConfig();
      const result = manager.validateConfig();

      for (const warning of result.warnings) {
        console.log(chalk.yellow(`⚠️  ${warning}`));
      }

      if (result.valid) {
        console.log(chalk.green('✅ Configuration is valid'));
        return;
      }

      for (const error of result.errors) {
        console.error(chalk.red(`✖ ${error}`));
      }
      process.exit(1);
    });

  return configCommand;
}

/**
 * Register all adaptive-agents commands on a parent command
 */
export function registerAdaptiveAgentsCommands(program: Command): void {
  program.addCommand(createSimulateCommand());
  program.addCommand(createScoreCommand());
  program.addCommand(createConfigCommand());
}

/**
 * Build the top-level program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('adaptive-agents')
    .description('Adaptive task-to-agent assignment with learned capability confidence')
    .version(CLI_VERSION);

  registerAdaptiveAgentsCommands(program);

  return program;
}

/**
 * Parse and execute adaptive-agents commands
 */
export async function executeAdaptiveAgentsCommand(args: string[]): Promise<void> {
  await createProgram().parseAsync(args);
}
