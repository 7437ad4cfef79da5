#!/usr/bin/env node
/**
 * adaptive-agents CLI entry point
 */

import { config as loadEnv } from 'dotenv';
import chalk from 'chalk';
import { executeAdaptiveAgentsCommand } from '../adaptive-agents/cli/commands';
import { describeError } from '../adaptive-agents/core/errors';

loadEnv();

executeAdaptiveAgentsCommand(process.argv).catch((error: unknown) => {
  console.error(chalk.red('Error:'), describeError(error));
  process.exit(1);
});
