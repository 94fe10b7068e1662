#!/usr/bin/env node
import 'dotenv/config';
import { program } from 'commander';
import { BiographyResearchFlow } from './agents/research-flow.js';
import {
  loadSettings,
  resolveResearchConfig,
  type ResearchConfig,
  type WorkflowMode,
} from './config/index.js';
import { getSecret } from './services/secrets.js';
import { cliLogger, errorMessage, setupErrorHandlers } from './utils/logger.js';

const DEFAULT_PERSON = 'Keir Starmer';
const RESEARCH_PREVIEW_LENGTH = 1500;

interface ResearchOptions {
  config?: string;
  mode?: string;
  maxIterations?: string;
}

function parseMode(value: string | undefined): WorkflowMode | undefined {
  if (value === undefined) return undefined;
  if (value === 'iterative' || value === 'single_pass') return value;
  throw new Error(`Unknown mode "${value}" (expected iterative or single_pass)`);
}

function parseIterations(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`--max-iterations must be a positive integer, got "${value}"`);
  }
  return parsed;
}

/**
 * Fills in the Tavily key from Secret Manager when neither the environment
 * nor the settings file supplied one.
 */
async function withTavilyKey(config: ResearchConfig): Promise<ResearchConfig> {
  if (config.search.apiKey || !config.tavilySecret) {
    return config;
  }
  const apiKey = await getSecret(config.tavilySecret);
  return { ...config, search: { ...config.search, apiKey } };
}

function printMissingKeyHelp(): void {
  console.log('Error: no Tavily API key configured.');
  console.log('');
  console.log('Get a key from https://tavily.com, then either:');
  console.log('  export TAVILY_API_KEY=your-key');
  console.log('or add it to a .env file in this directory, or reference a secret in app_settings.yaml:');
  console.log('  secrets:');
  console.log('    tavily_api_key:');
  console.log('      project: your-gcp-project');
  console.log('      secret: tavily-api-key');
}

function preview(text: string): string {
  return text.length > RESEARCH_PREVIEW_LENGTH
    ? `${text.substring(0, RESEARCH_PREVIEW_LENGTH)}...`
    : text;
}

async function research(personName: string, options: ResearchOptions): Promise<void> {
  const settings = loadSettings(options.config);
  const resolved = resolveResearchConfig(settings);
  const config = await withTavilyKey({
    ...resolved,
    mode: parseMode(options.mode) ?? resolved.mode,
    maxIterations: parseIterations(options.maxIterations) ?? resolved.maxIterations,
  });

  if (!config.search.apiKey) {
    cliLogger.warn('No Tavily API key available; research not started');
    printMissingKeyHelp();
    return;
  }

  cliLogger.info({ personName, mode: config.mode, maxIterations: config.maxIterations }, 'Starting research');

  const flow = new BiographyResearchFlow({ config });
  await flow.initialize();

  console.log(`Researching early life of ${personName} (${config.mode} mode)...`);
  const summary = await flow.researchPerson(personName);

  if (!summary) {
    console.log('No summary was produced. See logs/agent.log for details.');
    process.exitCode = 1;
    return;
  }

  console.log('');
  console.log('=== Early Life Summary ===');
  console.log(summary);

  const status = flow.getReviewStatus();
  if (status) {
    console.log('');
    console.log(`Review status: ${status}`);
    const feedback = flow.getReviewFeedback();
    if (feedback) {
      console.log(`Review feedback: ${feedback}`);
    }
  }

  const outcome = flow.getRefinementOutcome();
  if (outcome) {
    console.log(`Refinement outcome: ${outcome}`);
  }

  const researchData = flow.getResearchData();
  if (researchData) {
    console.log('');
    console.log('=== Research Data ===');
    console.log(preview(researchData));
  }
}

setupErrorHandlers(cliLogger);

program
  .name('bio-research')
  .description('Researches and writes early-life biography summaries of politicians')
  .version('0.1.0');

program
  .command('research', { isDefault: true })
  .description('Research one person and print the early-life summary')
  .argument('[name]', 'Person to research', DEFAULT_PERSON)
  .option('-c, --config <path>', 'Path to app_settings.yaml')
  .option('-m, --mode <mode>', 'Workflow mode: iterative or single_pass')
  .option('-n, --max-iterations <number>', 'Refinement iteration budget')
  .action(async (name: string, options: ResearchOptions) => {
    try {
      await research(name, options);
    } catch (error) {
      cliLogger.error({ error: errorMessage(error) }, 'Research command failed');
      console.error(`Error: ${errorMessage(error)}`);
      process.exitCode = 1;
    }
  });

await program.parseAsync();
