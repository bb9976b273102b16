/**
 * Research Configuration System
 *
 * Loads and manages configuration from research-config.yaml, applies
 * environment overrides and exposes strongly typed getters.
 * Every field has a default, so a missing or partial file is valid.
 */

import * as fs from "fs";
import * as path from "path";
import * as yaml from "js-yaml";
import { z } from "zod";
import { ConfigurationError } from "../../utils/errors";
import { createChildLogger } from "../../utils/logger";

const log = createChildLogger({ component: "config" });

// =============================================================================
// Schema
// =============================================================================

const ModelConfigSchema = (model: string, temperature: number) =>
  z
    .object({
      model: z.string().min(1).default(model),
      temperature: z.number().min(0).max(2).default(temperature),
      maxOutputTokens: z.number().int().positive().optional(),
    })
    .default({});

const LLMConfigSchema = z
  .object({
    provider: z.enum(["openai"]).default("openai"),
    models: z
      .object({
        queryGeneration: ModelConfigSchema("gpt-4o-mini", 0.7),
        relevanceJudgment: ModelConfigSchema("gpt-4o-mini", 0),
        reportSynthesis: ModelConfigSchema("gpt-4o-mini", 0.3),
      })
      .default({}),
  })
  .default({});

const WebSearchConfigSchema = z
  .object({
    provider: z.enum(["brave"]).default("brave"),
    resultsPerQuery: z.number().int().min(1).max(20).default(10),
    concurrency: z.number().int().min(1).default(5),
    maxRetries: z.number().int().min(0).default(3),
    backoffBaseMs: z.number().int().min(0).default(1000),
    country: z.string().optional(),
    language: z.string().optional(),
    safeSearch: z.enum(["off", "moderate", "strict"]).default("moderate"),
  })
  .default({});

const AcademicSearchConfigSchema = z
  .object({
    provider: z.enum(["semantic-scholar"]).default("semantic-scholar"),
    resultsPerQuery: z.number().int().min(1).max(100).default(20),
    maxAttempts: z.number().int().min(1).default(5),
    backoffBaseMs: z.number().int().min(0).default(1000),
    minCitationCount: z.number().int().min(0).default(3),
    abstractMinLength: z.number().int().min(0).default(200),
  })
  .default({});

const ExtractionConfigSchema = z
  .object({
    timeoutMs: z.number().int().positive().default(15000),
    userAgent: z
      .string()
      .min(1)
      .default("Mozilla/5.0 (compatible; EvidenceHarvester/1.0)"),
    maxRetries: z.number().int().min(0).default(2),
    retryDelayMs: z.number().int().min(0).default(1000),
    maxTokensPerDocument: z.number().int().positive().default(2000),
  })
  .default({});

const DeduplicationConfigSchema = z
  .object({
    maxKeep: z.number().int().positive().default(100),
    similarityThreshold: z.number().min(0).max(1).default(0.85),
    maxFeatures: z.number().int().positive().default(5000),
  })
  .default({});

const ResearchPipelineConfigSchema = z
  .object({
    generalQueries: z.number().int().min(0).default(5),
    academicQueries: z.number().int().min(0).default(3),
  })
  .default({});

export const ResearchConfigSchema = z.object({
  llm: LLMConfigSchema,
  search: z
    .object({
      web: WebSearchConfigSchema,
      academic: AcademicSearchConfigSchema,
    })
    .default({}),
  extraction: ExtractionConfigSchema,
  deduplication: DeduplicationConfigSchema,
  research: ResearchPipelineConfigSchema,
});

// =============================================================================
// Type Definitions
// =============================================================================

export type ResearchConfig = z.infer<typeof ResearchConfigSchema>;
export type LLMConfig = ResearchConfig["llm"];
export type ModelConfig = LLMConfig["models"]["queryGeneration"];
export type ModelStep = keyof LLMConfig["models"];
export type WebSearchConfig = ResearchConfig["search"]["web"];
export type AcademicSearchConfig = ResearchConfig["search"]["academic"];
export type ExtractionConfig = ResearchConfig["extraction"];
export type DeduplicationConfig = ResearchConfig["deduplication"];
export type ResearchPipelineConfig = ResearchConfig["research"];

/**
 * Default configuration values (used when config file is not found)
 */
export const DEFAULT_CONFIG: ResearchConfig = ResearchConfigSchema.parse({});

/**
 * API credentials, read from the environment only
 */
export interface Credentials {
  openaiApiKey: string;
  braveSearchApiKey: string;
  semanticScholarApiKey?: string;
}

// =============================================================================
// Configuration Loader
// =============================================================================

const CONFIG_FILENAME = "research-config.yaml";

let cachedConfig: ResearchConfig | null = null;
let configPath: string | null = null;

/**
 * Find the research-config.yaml file by searching upward from a starting directory
 */
export function findConfigFile(startDir?: string): string | null {
  let currentDir = startDir || process.cwd();

  // Search up to 10 levels up
  for (let i = 0; i < 10; i++) {
    const configFilePath = path.join(currentDir, CONFIG_FILENAME);
    if (fs.existsSync(configFilePath)) {
      return configFilePath;
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      break;
    }
    currentDir = parentDir;
  }

  return null;
}

function parseInteger(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") {
    return undefined;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : undefined;
}

/**
 * Apply CONCURRENCY, MAX_TOKENS_PER_URL, MAX_SNIPPETS_TO_KEEP,
 * MIN_CITATION_COUNT and USER_AGENT on top of a parsed config
 */
export function applyEnvOverrides(
  config: ResearchConfig,
  env: NodeJS.ProcessEnv = process.env
): ResearchConfig {
  const concurrency = parseInteger(env.CONCURRENCY);
  const maxTokens = parseInteger(env.MAX_TOKENS_PER_URL);
  const maxKeep = parseInteger(env.MAX_SNIPPETS_TO_KEEP);
  const minCitations = parseInteger(env.MIN_CITATION_COUNT);
  const userAgent = env.USER_AGENT?.trim();

  return ResearchConfigSchema.parse({
    ...config,
    search: {
      web: {
        ...config.search.web,
        ...(concurrency !== undefined ? { concurrency } : {}),
      },
      academic: {
        ...config.search.academic,
        ...(minCitations !== undefined
          ? { minCitationCount: minCitations }
          : {}),
      },
    },
    extraction: {
      ...config.extraction,
      ...(maxTokens !== undefined ? { maxTokensPerDocument: maxTokens } : {}),
      ...(userAgent ? { userAgent } : {}),
    },
    deduplication: {
      ...config.deduplication,
      ...(maxKeep !== undefined ? { maxKeep } : {}),
    },
  });
}

/**
 * Parse raw YAML text into a validated config (defaults filled in)
 */
export function parseConfig(fileContents: string): ResearchConfig {
  const raw: unknown = yaml.load(fileContents);
  return ResearchConfigSchema.parse(raw ?? {});
}

/**
 * Load configuration from YAML file
 */
export function loadConfig(customPath?: string): ResearchConfig {
  // Return cached config if available and no custom path specified
  if (cachedConfig && !customPath) {
    return cachedConfig;
  }

  const filePath = customPath || findConfigFile();

  if (!filePath) {
    log.warn(`${CONFIG_FILENAME} not found, using default configuration`);
    cachedConfig = applyEnvOverrides(DEFAULT_CONFIG);
    return cachedConfig;
  }

  try {
    const fileContents = fs.readFileSync(filePath, "utf8");
    const config = applyEnvOverrides(parseConfig(fileContents));

    cachedConfig = config;
    configPath = filePath;

    log.info({ path: filePath }, "Loaded research config");
    return config;
  } catch (error) {
    log.error({ path: filePath, err: error }, "Error loading config");
    log.warn("Using default configuration");
    cachedConfig = applyEnvOverrides(DEFAULT_CONFIG);
    return cachedConfig;
  }
}

/**
 * Get the currently loaded configuration
 * Loads from file if not yet loaded
 */
export function getConfig(): ResearchConfig {
  if (!cachedConfig) {
    return loadConfig();
  }
  return cachedConfig;
}

/**
 * Clear the cached configuration (useful for testing or reloading)
 */
export function clearConfigCache(): void {
  cachedConfig = null;
  configPath = null;
}

/**
 * Get the path to the loaded config file
 */
export function getConfigPath(): string | null {
  return configPath;
}

/**
 * Read API credentials. Missing required keys are fatal.
 */
export function loadCredentials(
  env: NodeJS.ProcessEnv = process.env
): Credentials {
  const missing: string[] = [];
  const openaiApiKey = env.OPENAI_API_KEY?.trim();
  const braveSearchApiKey = env.BRAVE_SEARCH_API_KEY?.trim();

  if (!openaiApiKey) missing.push("OPENAI_API_KEY");
  if (!braveSearchApiKey) missing.push("BRAVE_SEARCH_API_KEY");

  if (!openaiApiKey || !braveSearchApiKey) {
    throw new ConfigurationError(
      `Missing API keys: ${missing.join(", ")}`,
      missing
    );
  }

  return {
    openaiApiKey,
    braveSearchApiKey,
    semanticScholarApiKey: env.SEMANTIC_SCHOLAR_API_KEY?.trim() || undefined,
  };
}
