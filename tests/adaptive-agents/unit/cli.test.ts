/**
 * Unit Tests for CLI command wiring
 */

import { describe, expect, it, afterEach, beforeEach, jest } from '@jest/globals';
import chalk from 'chalk';
import { createProgram } from '../../../src/adaptive-agents/cli/commands';

describe('CLI', () => {
  const originalLevel = chalk.level;

  beforeEach(() => {
    chalk.level = 0;
  });

  afterEach(() => {
    chalk.level = originalLevel;
    jest.restoreAllMocks();
  });

  it('should register simulate, score and config', () => {
    expect(createProgram().commands.map(command => command.name())).toEqual(['simulate', 'score', 'config']);
  });

  it('should print a score breakdown', async () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);

    await createProgram().parseAsync(['score', '--agent-caps', 'x,y', '--task-caps', 'x'], { from: 'user' });

    expect(log.mock.calls[0]?.[0]).toBe('\n🎯 Score: 0.750\n');
    expect(log).toHaveBeenCalledWith('Full capability match; 50% confidence; 50% recent success');
  });

  it('should reject a malformed capability list', async () => {
    const program = createProgram().exitOverride();
    for (const command of program.commands) {
      command.exitOverride().configureOutput({ writeErr: () => undefined });
    }

    await expect(
      program.parseAsync(['score', '--agent-caps', ' , ', '--task-caps', 'x'], { from: 'user' })
    ).rejects.toThrow('Expected a comma-separated list of capabilities.');
  });
});
