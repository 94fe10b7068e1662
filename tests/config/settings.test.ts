import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  clearSettingsCache,
  findSettingsFile,
  getModelName,
  loadSettings,
  parseSettings,
  resolveResearchConfig,
} from '../../src/config/settings.js';
import { ConfigurationError } from '../../src/utils/errors.js';

const SAMPLE = `
models:
  default:
    name: gemini-2.0-flash
  agents:
    reviewer:
      name: gemini-2.5-pro
search:
  tavily_api_key: test-key
  max_results: 5
workflow:
  mode: single_pass
  max_iterations: 4
secrets:
  tavily_api_key:
    project: test-project
    secret: tavily
agent_prompts:
  answerer: Summarize {research_data}
`;

describe('parseSettings', () => {
  it('parses a settings document', () => {
    const settings = parseSettings(SAMPLE);

    expect(settings.models.default.name).toBe('gemini-2.0-flash');
    expect(settings.search.max_results).toBe(5);
    expect(settings.search.search_depth).toBe('advanced');
    expect(settings.workflow.mode).toBe('single_pass');
    expect(settings.secrets.tavily_api_key).toEqual({
      project: 'test-project',
      secret: 'tavily',
      version: 'latest',
    });
  });

  it('treats an empty document as all defaults', () => {
    expect(parseSettings('').workflow.max_iterations).toBe(3);
  });

  it('reports invalid YAML with its source', () => {
    expect(() => parseSettings('models: [unclosed', 'bad.yaml')).toThrow(/^Invalid YAML in bad\.yaml: /);
  });

  it('lists validation errors by path', () => {
    expect(() => parseSettings('workflow:\n  max_iterations: 0\n', 'app.yaml')).toThrow(
      /^Invalid configuration in app\.yaml:\n {2}- workflow\.max_iterations: /
    );
  });
});

describe('getModelName', () => {
  it('prefers a per-agent override', () => {
    const settings = parseSettings(SAMPLE);
    expect(getModelName('reviewer', settings)).toBe('gemini-2.5-pro');
    expect(getModelName('researcher', settings)).toBe('gemini-2.0-flash');
  });
});

describe('resolveResearchConfig', () => {
  it('maps settings into the research config', () => {
    const config = resolveResearchConfig(parseSettings(SAMPLE), {});

    expect(config).toEqual({
      appName: 'early_life_biographer',
      userId: 'default_user',
      mode: 'single_pass',
      maxIterations: 4,
      models: {
        researcher: 'gemini-2.0-flash',
        answerer: 'gemini-2.0-flash',
        reviewer: 'gemini-2.5-pro',
        refiner: 'gemini-2.0-flash',
      },
      prompts: { answerer: 'Summarize {research_data}' },
      search: {
        apiKey: 'test-key',
        maxResults: 5,
        searchDepth: 'advanced',
        includeAnswer: false,
        includeRawContent: true,
        includeImages: false,
        maxContentLength: 4000,
      },
      tavilySecret: { project: 'test-project', secret: 'tavily', version: 'latest' },
    });
  });

  it('lets the environment override model, key and iterations', () => {
    const config = resolveResearchConfig(parseSettings(SAMPLE), {
      GEMINI_MODEL: 'gemini-test',
      TAVILY_API_KEY: 'env-test-key',
      RESEARCH_MAX_ITERATIONS: '7',
    });

    expect(config.models).toEqual({
      researcher: 'gemini-test',
      answerer: 'gemini-test',
      reviewer: 'gemini-2.5-pro',
      refiner: 'gemini-test',
    });
    expect(config.search.apiKey).toBe('env-test-key');
    expect(config.maxIterations).toBe(7);
  });

  it('ignores blank or invalid environment values', () => {
    const config = resolveResearchConfig(parseSettings(SAMPLE), {
      GEMINI_MODEL: '  ',
      TAVILY_API_KEY: '',
      RESEARCH_MAX_ITERATIONS: 'zero',
    });

    expect(config.models.researcher).toBe('gemini-2.0-flash');
    expect(config.search.apiKey).toBe('test-key');
    expect(config.maxIterations).toBe(4);
  });

  it('leaves the key unset when neither source has one', () => {
    const config = resolveResearchConfig(parseSettings(''), {});

    expect(config.search.apiKey).toBeUndefined();
    expect(config.mode).toBe('iterative');
    expect(config.models.researcher).toBe('gemini-2.5-flash');
  });
});

describe('settings files', () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'bio-settings-'));
    clearSettingsCache();
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
    clearSettingsCache();
  });

  it('finds app_settings.yaml in a parent directory', () => {
    const nested = join(root, 'a', 'b');
    mkdirSync(nested, { recursive: true });
    writeFileSync(join(root, 'app_settings.yaml'), 'workflow:\n  max_iterations: 2\n');

    expect(findSettingsFile(nested)).toBe(join(root, 'app_settings.yaml'));
  });

  it('loads an explicit settings path', () => {
    const path = join(root, 'custom.yaml');
    writeFileSync(path, 'workflow:\n  max_iterations: 2\n');

    expect(loadSettings(path).workflow.max_iterations).toBe(2);
  });

  it('throws for a missing explicit path', () => {
    expect(() => loadSettings(join(root, 'missing.yaml'))).toThrow(ConfigurationError);
  });
});
