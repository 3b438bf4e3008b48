/**
 * Application configuration, read once from the environment at startup.
 *
 * See apps/api/.env.example for the recognized variables.
 */

export const APP_CONFIG = Symbol('APP_CONFIG');

/** Origin list entry that allows any origin */
export const ANY_ORIGIN = '*';

export interface LlmConfig {
  /** OpenAI-compatible Chat Completions endpoint */
  apiUrl: string;
  /** Bearer token; empty when not configured */
  apiKey: string;
  model: string;
  /** Deadline for a single provider call */
  timeoutMs: number;
}

export interface AppConfig {
  /** CORS origins. ["*"] allows any origin. */
  allowedOrigins: string[];
  host: string;
  port: number;
  /** Path prefix every route is mounted under */
  routePrefix: string;
  /** Models reported by GET /capabilities */
  capabilities: string[];
  llm: LlmConfig;
}

export const ROUTE_PREFIX = 'api/nextgen';

const DEFAULT_PORT = 8000;
const DEFAULT_HOST = '0.0.0.0';
const DEFAULT_LLM_API_URL = 'https://api.openai.com/v1/chat/completions';
const DEFAULT_LLM_MODEL = 'gpt-4o-mini';
const DEFAULT_LLM_TIMEOUT_MS = 60_000;
const DEFAULT_CAPABILITIES = ['03-mini-openai', 'gpt-4', 'llama-3'];

/** Largest delay setTimeout accepts; longer ones fire after 1ms */
const MAX_TIMEOUT_MS = 2_147_483_647;

function parseList(value: string | undefined): string[] {
  if (value === undefined) return [];
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

function parsePositiveInt(name: string, value: string, max: number): number {
  const parsed = Number(value.trim());
  if (!Number.isInteger(parsed) || parsed < 1 || parsed > max) {
    throw new Error(`${name}: "${value}" is not valid (must be 1-${max})`);
  }
  return parsed;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Build the configuration from an environment map.
 * Throws on values that cannot be parsed.
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const origins = parseList(env.ALLOWED_ORIGINS);
  const capabilities = parseList(env.CAPABILITY_MODELS);

  return {
    allowedOrigins: origins.length > 0 ? origins : [ANY_ORIGIN],
    host: nonEmpty(env.HOST) ?? DEFAULT_HOST,
    port: env.PORT ? parsePositiveInt('PORT', env.PORT, 65535) : DEFAULT_PORT,
    routePrefix: ROUTE_PREFIX,
    capabilities: capabilities.length > 0 ? capabilities : [...DEFAULT_CAPABILITIES],
    llm: {
      apiUrl: nonEmpty(env.LLM_API_URL) ?? DEFAULT_LLM_API_URL,
      apiKey: (env.LLM_API_KEY ?? '').trim(),
      model: nonEmpty(env.LLM_MODEL) ?? DEFAULT_LLM_MODEL,
      timeoutMs: env.LLM_TIMEOUT_MS
        ? parsePositiveInt('LLM_TIMEOUT_MS', env.LLM_TIMEOUT_MS, MAX_TIMEOUT_MS)
        : DEFAULT_LLM_TIMEOUT_MS,
    },
  };
}

/**
 * Whether the origin list allows every origin.
 */
export function allowsAnyOrigin(config: Pick<AppConfig, 'allowedOrigins'>): boolean {
  return config.allowedOrigins.includes(ANY_ORIGIN);
}
