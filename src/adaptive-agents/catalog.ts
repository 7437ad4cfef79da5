/**
 * Capability catalog: the capability vocabulary, task templates and demo agents
 * shipped in config/capabilities.json.
 */

import * as fs from 'fs';
import * as path from 'path';
import { NotFoundError, ValidationError, describeError } from './core/errors';
import { normalizeCapabilities, type Capability, type CreateTaskInput } from './core/types';

export interface TaskTemplate {
  name: string;
  description: string;
  requiredCapabilities: Capability[];
  complexity: number;
  priority: number;
  estimatedDuration: number;
}

export interface AgentTemplate {
  name: string;
  capabilities: Capability[];
}

export interface CapabilityCatalog {
  capabilities: Capability[];
  taskTemplates: TaskTemplate[];
  demoAgents: AgentTemplate[];
}

export const DEFAULT_CATALOG_PATH = path.resolve(__dirname, '..', '..', 'config', 'capabilities.json');

/**
 * Read and validate a catalog file
 *
 * @throws NotFoundError if the file does not exist
 * @throws ValidationError if the file is not a valid catalog
 */
export function loadCatalog(filePath: string = DEFAULT_CATALOG_PATH): CapabilityCatalog {
  if (!fs.existsSync(filePath)) {
    throw new NotFoundError(`Catalog file not found: ${filePath}`, { filePath });
  }

  let raw: unknown = undefined;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ValidationError(`Catalog file ${filePath} is not valid JSON: ${describeError(error)}`, { filePath });
  }

  return parseCatalog(raw, filePath);
}

export function parseCatalog(raw: unknown, source = 'catalog'): CapabilityCatalog {
  if (!isRecord(raw)) {
    throw new ValidationError(`${source}: expected an object`);
  }

  const capabilities = normalizeCapabilities(readStringArray(raw.capabilities, `${source}.capabilities`));

  const templates = raw.taskTemplates;
  if (!Array.isArray(templates)) {
    throw new ValidationError(`${source}.taskTemplates must be an array`);
  }

  const agents = raw.demoAgents ?? [];
  if (!Array.isArray(agents)) {
    throw new ValidationError(`${source}.demoAgents must be an array`);
  }

  return {
    capabilities,
    taskTemplates: templates.map((entry, index) => parseTaskTemplate(entry, `${source}.taskTemplates[${index}]`)),
    demoAgents: agents.map((entry, index) => parseAgentTemplate(entry, `${source}.demoAgents[${index}]`))
  };
}

/**
 * Task input for a template, with an optional name suffix for repeated rounds
 */
export function templateToTaskInput(template: TaskTemplate, suffix?: string): CreateTaskInput {
  return {
    name: suffix ? `${template.name} ${suffix}` : template.name,
    description: template.description,
    requiredCapabilities: [...template.requiredCapabilities],
    complexity: template.complexity,
    priority: template.priority,
    estimatedDuration: template.estimatedDuration,
    metadata: { template: template.name }
  };
}

function parseTaskTemplate(entry: unknown, where: string): TaskTemplate {
  if (!isRecord(entry)) {
    throw new ValidationError(`${where} must be an object`);
  }

  const requiredCapabilities = normalizeCapabilities(
    readStringArray(entry.requiredCapabilities, `${where}.requiredCapabilities`)
  );
  if (requiredCapabilities.length === 0) {
    throw new ValidationError(`${where}.requiredCapabilities must not be empty`);
  }

  return {
    name: readString(entry.name, `${where}.name`),
    description: typeof entry.description === 'string' ? entry.description : '',
    requiredCapabilities,
    complexity: readNumber(entry.complexity, `${where}.complexity`),
    priority: readNumber(entry.priority, `${where}.priority`),
    estimatedDuration: readNumber(entry.estimatedDuration, `${where}.estimatedDuration`)
  };
}

function parseAgentTemplate(entry: unknown, where: string): AgentTemplate {
  if (!isRecord(entry)) {
    throw new ValidationError(`${where} must be an object`);
  }
  return {
    name: readString(entry.name, `${where}.name`),
    capabilities: normalizeCapabilities(readStringArray(entry.capabilities, `${where}.capabilities`))
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function readString(value: unknown, where: string): string {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ValidationError(`${where} must be a non-empty string`);
  }
  return value;
}

function readNumber(value: unknown, where: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ValidationError(`${where} must be a number`);
  }
  return value;
}

function readStringArray(value: unknown, where: string): string[] {
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new ValidationError(`${where} must be an array of strings`);
  }
  return value;
}
