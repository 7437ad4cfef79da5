/**
 * Adaptive Agents Configuration Manager
 *
 * Loads configuration from multiple sources with priority order:
 * 1. CLI flags / programmatic overrides (highest)
 * 2. Environment variables
 * 3. Config file
 * 4. Defaults (lowest)
 */

import * as fs from 'fs';
import * as path from 'path';
import { isLogLevel, type LoggingConfig } from '../../core/logger';

/**
 * Complete configuration schema
 */
export interface AdaptiveConfig {
  learning: {
    /** Learning rate given to newly registered agents */
    learningRate: number;
    /** Learning rate applied to every agent while training mode is on */
    trainingLearningRate: number;
    /** Start new controllers in training mode */
    trainingMode: boolean;
  };
  assignment: {
    /** Exclude agents with no overlapping capability from ranking */
    requireCapabilityOverlap: boolean;
    /** Candidates scoring below this are not assigned (0-1) */
    minimumScore: number;
  };
  simulation: {
    rounds: number;
    /** Seed for the simulation random source; 0 means Math.random */
    seed: number;
  };
  logging: LoggingConfig;
}

export type AdaptiveConfigOverrides = {
  [K in keyof AdaptiveConfig]?: Partial<AdaptiveConfig[K]>;
};

/**
 * Configuration validation result
 */
export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: AdaptiveConfig = {
  learning: {
    learningRate: 0.1,
    trainingLearningRate: 0.3,
    trainingMode: false
  },
  assignment: {
    requireCapabilityOverlap: true,
    minimumScore: 0
  },
  simulation: {
    rounds: 5,
    seed: 0
  },
  logging: {
    level: 'info',
    format: 'text',
    destination: 'console'
  }
};

/**
 * Key under which the configuration lives in a config file
 */
export const CONFIG_FILE_KEY = 'adaptiveAgents';

export const CONFIG_FILE_NAMES = [
  '.adaptive-agents.json',
  'adaptive-agents.config.json'
];

/**
 * Environment variable mappings
 */
const ENV_VAR_MAPPINGS: Record<string, string> = {
  'ADAPTIVE_AGENTS_LEARNING_RATE': 'learning.learningRate',
  'ADAPTIVE_AGENTS_TRAINING_LEARNING_RATE': 'learning.trainingLearningRate',
  'ADAPTIVE_AGENTS_TRAINING_MODE': 'learning.trainingMode',
  'ADAPTIVE_AGENTS_REQUIRE_OVERLAP': 'assignment.requireCapabilityOverlap',
  'ADAPTIVE_AGENTS_MINIMUM_SCORE': 'assignment.minimumScore',
  'ADAPTIVE_AGENTS_SIMULATION_ROUNDS': 'simulation.rounds',
  'ADAPTIVE_AGENTS_SIMULATION_SEED': 'simulation.seed',
  'ADAPTIVE_AGENTS_LOG_LEVEL': 'logging.level',
  'ADAPTIVE_AGENTS_LOG_FORMAT': 'logging.format',
  'ADAPTIVE_AGENTS_LOG_DESTINATION': 'logging.destination'
};

type ConfigValue = string | number | boolean;

interface ConfigNode {
  [key: string]: ConfigValue | ConfigNode | undefined;
}

function isConfigNode(value: unknown): value is ConfigNode {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export interface ConfigManagerOptions {
  /** Directory searched for config files (default: process.cwd()) */
  cwd?: string;
  /** Environment to read (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

/**
 * Adaptive Agents Configuration Manager
 *
 * Singleton that manages configuration loading, validation, and access.
 */
export class AdaptiveConfigManager {
  private static instance: AdaptiveConfigManager | null = null;
  private config: AdaptiveConfig;
  private validationResult: ConfigValidationResult | null = null;
  private configFilePath: string | null = null;
  private loadWarnings: string[] = [];
  private cwd: string;
  private env: NodeJS.ProcessEnv;

  constructor(options: ConfigManagerOptions = {}) {
    this.config = cloneConfig(DEFAULT_CONFIG);
    this.cwd = options.cwd ?? process.cwd();
    this.env = options.env ?? process.env;
  }

  /**
   * Get the singleton instance
   */
  public static getInstance(): AdaptiveConfigManager {
    if (!AdaptiveConfigManager.instance) {
      AdaptiveConfigManager.instance = new AdaptiveConfigManager();
    }
    return AdaptiveConfigManager.instance;
  }

  /**
   * Reset the singleton instance (useful for testing)
   */
  public static resetInstance(): void {
    AdaptiveConfigManager.instance = null;
  }

  /**
   * Load configuration from all sources with proper priority
   */
  public loadConfig(overrides: AdaptiveConfigOverrides = {}): AdaptiveConfig {
    this.config = cloneConfig(DEFAULT_CONFIG);
    this.loadWarnings = [];
    this.configFilePath = null;

    this.loadFromConfigFile();
    this.loadFromEnvironment();
    this.applyOverrides(overrides);

    this.validationResult = this.validateConfig();

    return this.getConfig();
  }

  public getConfig(): AdaptiveConfig {
    return cloneConfig(this.config);
  }

  public getValidationResult(): ConfigValidationResult | null {
    return this.validationResult;
  }

  /**
   * Update configuration at runtime
   */
  public updateConfig(updates: AdaptiveConfigOverrides): AdaptiveConfig {
    this.applyOverrides(updates);
    this.validationResult = this.validateConfig();
    return this.getConfig();
  }

  public getConfigFilePath(): string | null {
    return this.configFilePath;
  }

  /**
   * Validate the current configuration
   */
  public validateConfig(): ConfigValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [...this.loadWarnings];
    const { learning, assignment, simulation, logging } = this.config;

    if (!isUnitInterval(learning.learningRate)) {
      errors.push('learning.learningRate must be a number between 0 and 1');
    }

    if (!isUnitInterval(learning.trainingLearningRate)) {
      errors.push('learning.trainingLearningRate must be a number between 0 and 1');
    }

    if (typeof learning.trainingMode !== 'boolean') {
      errors.push('learning.trainingMode must be a boolean');
    }

    if (learning.learningRate === 0) {
      warnings.push('learning.learningRate is 0; agents will never learn');
    }

    if (isUnitInterval(learning.learningRate) && isUnitInterval(learning.trainingLearningRate) &&
        learning.trainingLearningRate < learning.learningRate) {
      warnings.push('learning.trainingLearningRate is lower than learning.learningRate');
    }

    if (typeof assignment.requireCapabilityOverlap !== 'boolean') {
      errors.push('assignment.requireCapabilityOverlap must be a boolean');
    }

    if (!isUnitInterval(assignment.minimumScore)) {
      errors.push('assignment.minimumScore must be a number between 0 and 1');
    }

    if (assignment.requireCapabilityOverlap === false) {
      warnings.push('assignment.requireCapabilityOverlap is disabled; agents may be assigned tasks they cannot perform');
    }

    if (!Number.isInteger(simulation.rounds) || simulation.rounds < 1) {
      errors.push('simulation.rounds must be a positive integer');
    }

    if (!Number.isInteger(simulation.seed) || simulation.seed < 0) {
      errors.push('simulation.seed must be a non-negative integer');
    }

    if (!isLogLevel(logging.level)) {
      errors.push('logging.level must be one of debug, info, warn, error');
    }

    if (logging.format !== 'text' && logging.format !== 'json') {
      errors.push('logging.format must be text or json');
    }

    if (logging.destination !== 'console' && logging.destination !== 'none') {
      errors.push('logging.destination must be console or none');
    }

    return {
      valid: errors.length === 0,
      errors,
      warnings
    };
  }

  /**
   * Export current configuration to a file
   */
  public exportConfig(filePath: string): void {
    const configDir = path.dirname(filePath);
    if (!fs.existsSync(configDir)) {
      fs.mkdirSync(configDir, { recursive: true });
    }

    const exportData = {
      [CONFIG_FILE_KEY]: this.config
    };

    fs.writeFileSync(filePath, JSON.stringify(exportData, null, 2), 'utf-8');
    this.configFilePath = filePath;
  }

  /**
   * Load the first config file found in the working directory.
   * Unreadable files are skipped and reported as warnings.
   */
  private loadFromConfigFile(): void {
    for (const fileName of CONFIG_FILE_NAMES) {
      const configPath = path.join(this.cwd, fileName);
      if (!fs.existsSync(configPath)) {
        continue;
      }

      let parsed: unknown = undefined;
      try {
        parsed = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        this.loadWarnings.push(`Ignoring config file ${configPath}: ${reason}`);
        continue;
      }

      const section = isConfigNode(parsed) ? parsed[CONFIG_FILE_KEY] : undefined;
      if (isConfigNode(section)) {
        this.mergeConfig(section);
        this.configFilePath = configPath;
        break;
      }

      this.loadWarnings.push(`Config file ${configPath} has no "${CONFIG_FILE_KEY}" section`);
    }
  }

  private loadFromEnvironment(): void {
    for (const [envVar, configPath] of Object.entries(ENV_VAR_MAPPINGS)) {
      const value = this.env[envVar];
      if (value !== undefined && value !== '') {
        this.setNestedValue(configPath, parseEnvValue(value));
      }
    }
  }

  private applyOverrides(overrides: AdaptiveConfigOverrides): void {
    this.mergeConfig(toConfigNode(overrides));
  }

  /**
   * Deep merge known sections; unknown keys are reported
   */
  private mergeConfig(source: ConfigNode, target: ConfigNode = toConfigNode(this.config), keyPath = ''): void {
    for (const [key, value] of Object.entries(source)) {
      const fullKey = keyPath ? `${keyPath}.${key}` : key;
      if (!(key in target)) {
        this.loadWarnings.push(`Unknown configuration key: ${fullKey}`);
        continue;
      }
      if (value === undefined) {
        continue;
      }
      const existing = target[key];
      if (isConfigNode(existing)) {
        if (isConfigNode(value)) {
          this.mergeConfig(value, existing, fullKey);
        } else {
          this.loadWarnings.push(`${fullKey} must be an object`);
        }
      } else {
        target[key] = value;
      }
    }
  }

  private setNestedValue(dotPath: string, value: ConfigValue): void {
    const keys = dotPath.split('.');
    const leaf = keys.pop();
    let current: ConfigNode = toConfigNode(this.config);

    for (const key of keys) {
      const next = current[key];
      if (!isConfigNode(next)) {
        return;
      }
      current = next;
    }

    if (leaf !== undefined) {
      current[leaf] = value;
    }
  }
}

/**
 * Parse environment variable value to appropriate type
 */
export function parseEnvValue(value: string): ConfigValue {
  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;

  const numValue = Number(value);
  if (value.trim() !== '' && !isNaN(numValue)) return numValue;

  return value;
}

function isUnitInterval(value: unknown): boolean {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0 && value <= 1;
}

function cloneConfig(config: AdaptiveConfig): AdaptiveConfig {
  return {
    learning: { ...config.learning },
    assignment: { ...config.assignment },
    simulation: { ...config.simulation },
    logging: { ...config.logging }
  };
}

/**
 * View a typed configuration object as a generic node for merging
 */
function toConfigNode(value: object): ConfigNode {
  const node: unknown = value;
  return isConfigNode(node) ? node : {};
}

/**
 * Utility function: Get current configuration
 */
export function getConfig(): AdaptiveConfig {
  return AdaptiveConfigManager.getInstance().getConfig();
}

/**
 * Utility function: Load configuration with overrides
 */
export function loadConfig(overrides: AdaptiveConfigOverrides = {}): AdaptiveConfig {
  return AdaptiveConfigManager.getInstance().loadConfig(overrides);
}

/**
 * Utility function: Validate configuration
 */
export function validateConfig(): ConfigValidationResult {
  return AdaptiveConfigManager.getInstance().validateConfig();
}
