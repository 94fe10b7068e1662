/**
 * Settings Loader
 *
 * Loads and caches configuration from app_settings.yaml, searching from the
 * current directory up to the filesystem root. Turns the validated settings
 * plus environment overrides into the explicit ResearchConfig handed to
 * every component at construction.
 *
 * Dependencies:
 * - yaml: YAML parser for reading configuration files
 */
import { readFileSync, existsSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { ConfigurationError } from '../utils/errors.js';
import {
  AppSettingsSchema,
  AGENT_NAMES,
  type AgentName,
  type AppSettings,
  type SecretRef,
} from './schema.js';

const DEFAULT_SETTINGS_FILENAME = 'app_settings.yaml';

let cachedSettings: AppSettings | null = null;
let settingsPath: string | null = null;

export type WorkflowMode = AppSettings['workflow']['mode'];

export interface TavilySearchOptions {
  apiKey?: string;
  maxResults: number;
  searchDepth: 'basic' | 'advanced';
  includeAnswer: boolean;
  includeRawContent: boolean;
  includeImages: boolean;
  maxContentLength: number;
}

/**
 * Everything the research flow needs, resolved once by the caller.
 */
export interface ResearchConfig {
  appName: string;
  userId: string;
  mode: WorkflowMode;
  maxIterations: number;
  models: Record<AgentName, string>;
  prompts: Partial<Record<AgentName, string>>;
  search: TavilySearchOptions;
  tavilySecret?: SecretRef;
}

export function findSettingsFile(startDir: string = process.cwd()): string | null {
  let dir = resolve(startDir);

  while (true) {
    const candidate = resolve(dir, DEFAULT_SETTINGS_FILENAME);
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = dirname(dir);
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

/**
 * Loads settings from an explicit path, or from the nearest app_settings.yaml.
 * Without any file the schema defaults apply.
 */
export function loadSettings(path?: string): AppSettings {
  if (path && !existsSync(path)) {
    throw new ConfigurationError(`Configuration file not found: ${path}`, 'settings');
  }

  const configPath = path ?? findSettingsFile();
  if (!configPath) {
    return AppSettingsSchema.parse({});
  }

  if (cachedSettings && settingsPath === configPath) {
    return cachedSettings;
  }

  const content = readFileSync(configPath, 'utf-8');
  cachedSettings = parseSettings(content, configPath);
  settingsPath = configPath;

  return cachedSettings;
}

export function parseSettings(content: string, source = DEFAULT_SETTINGS_FILENAME): AppSettings {
  let raw: unknown;
  try {
    raw = parseYaml(content) ?? {};
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Invalid YAML syntax';
    throw new ConfigurationError(`Invalid YAML in ${source}: ${message}`, 'settings');
  }

  const result = AppSettingsSchema.safeParse(raw);
  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new ConfigurationError(`Invalid configuration in ${source}:\n${errors}`, 'settings');
  }

  return result.data;
}

export function clearSettingsCache(): void {
  cachedSettings = null;
  settingsPath = null;
}

export function getModelName(agentName: AgentName, settings: AppSettings): string {
  return settings.models.agents?.[agentName]?.name ?? settings.models.default.name;
}

export function getAgentPrompt(
  agentName: AgentName,
  settings: AppSettings
): string | undefined {
  return settings.agent_prompts[agentName];
}

function positiveInt(value: string | undefined): number | undefined {
  const trimmed = value?.trim();
  if (!trimmed) return undefined;
  const parsed = Number(trimmed);
  return Number.isInteger(parsed) && parsed >= 1 ? parsed : undefined;
}

/**
 * Builds the ResearchConfig. Environment values win over the settings file:
 * GEMINI_MODEL replaces the default model (per-agent overrides still apply),
 * TAVILY_API_KEY replaces search.tavily_api_key and RESEARCH_MAX_ITERATIONS
 * replaces workflow.max_iterations.
 */
export function resolveResearchConfig(
  settings: AppSettings = loadSettings(),
  env: NodeJS.ProcessEnv = process.env
): ResearchConfig {
  const envModel = env['GEMINI_MODEL']?.trim();
  const effective: AppSettings = envModel
    ? { ...settings, models: { ...settings.models, default: { name: envModel } } }
    : settings;

  const models: Record<AgentName, string> = {
    researcher: getModelName('researcher', effective),
    answerer: getModelName('answerer', effective),
    reviewer: getModelName('reviewer', effective),
    refiner: getModelName('refiner', effective),
  };

  const prompts: Partial<Record<AgentName, string>> = {};
  for (const name of AGENT_NAMES) {
    const prompt = getAgentPrompt(name, effective);
    if (prompt) {
      prompts[name] = prompt;
    }
  }

  const { search, workflow } = effective;

  return {
    appName: workflow.app_name,
    userId: workflow.user_id,
    mode: workflow.mode,
    maxIterations: positiveInt(env['RESEARCH_MAX_ITERATIONS']) ?? workflow.max_iterations,
    models,
    prompts,
    search: {
      apiKey: env['TAVILY_API_KEY']?.trim() || search.tavily_api_key,
      maxResults: search.max_results,
      searchDepth: search.search_depth,
      includeAnswer: search.include_answer,
      includeRawContent: search.include_raw_content,
      includeImages: search.include_images,
      maxContentLength: search.max_content_length,
    },
    tavilySecret: effective.secrets.tavily_api_key,
  };
}
