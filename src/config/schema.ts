/**
 * Configuration Schema
 *
 * Zod validation schemas for app_settings.yaml. Every section has defaults,
 * so an empty or missing file still yields a complete settings object.
 *
 * Dependencies:
 * - zod: TypeScript-first schema validation with static type inference
 */
import { z } from 'zod';

export const DEFAULT_MODEL = 'gemini-2.5-flash';

export const ModelConfigSchema = z.object({
  name: z.string().min(1),
});

export const ModelsConfigSchema = z.object({
  default: ModelConfigSchema.default({ name: DEFAULT_MODEL }),
  agents: z.record(z.string(), ModelConfigSchema.partial()).optional(),
});

export const SearchConfigSchema = z.object({
  provider: z.enum(['tavily']).default('tavily'),
  tavily_api_key: z.string().optional(),
  max_results: z.number().int().min(1).max(20).default(10),
  search_depth: z.enum(['basic', 'advanced']).default('advanced'),
  include_answer: z.boolean().default(false),
  include_raw_content: z.boolean().default(true),
  include_images: z.boolean().default(false),
  max_content_length: z.number().int().positive().default(4000),
});

export const WorkflowConfigSchema = z.object({
  app_name: z.string().min(1).default('early_life_biographer'),
  user_id: z.string().min(1).default('default_user'),
  mode: z.enum(['iterative', 'single_pass']).default('iterative'),
  max_iterations: z.number().int().min(1).max(10).default(3),
});

export const SecretRefSchema = z.object({
  project: z.string().min(1),
  secret: z.string().min(1),
  version: z.string().min(1).default('latest'),
});

export const SecretsConfigSchema = z.object({
  tavily_api_key: SecretRefSchema.optional(),
});

export const AgentPromptsSchema = z.record(z.string(), z.string());

export const AppSettingsSchema = z.object({
  models: ModelsConfigSchema.default({}),
  search: SearchConfigSchema.default({}),
  workflow: WorkflowConfigSchema.default({}),
  secrets: SecretsConfigSchema.default({}),
  agent_prompts: AgentPromptsSchema.default({}),
});

export type ModelConfig = z.infer<typeof ModelConfigSchema>;
export type ModelsConfig = z.infer<typeof ModelsConfigSchema>;
export type SearchConfig = z.infer<typeof SearchConfigSchema>;
export type WorkflowConfig = z.infer<typeof WorkflowConfigSchema>;
export type SecretRef = z.infer<typeof SecretRefSchema>;
export type SecretsConfig = z.infer<typeof SecretsConfigSchema>;
export type AgentPrompts = z.infer<typeof AgentPromptsSchema>;
export type AppSettings = z.infer<typeof AppSettingsSchema>;

export const AGENT_NAMES = ['researcher', 'answerer', 'reviewer', 'refiner'] as const;

export type AgentName = (typeof AGENT_NAMES)[number];
