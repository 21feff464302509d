import { z } from 'zod';

const DEFAULT_OPENWEATHER_BASE_URL = 'https://api.openweathermap.org/data/2.5';
const DEFAULT_EXCHANGERATE_BASE_URL = 'https://v6.exchangerate-api.com/v6';
const DEFAULT_WORLDTIME_BASE_URL = 'https://worldtimeapi.org/api';

const serverEnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  MCP_TRANSPORT: z.enum(['http', 'stdio']).default('http'),
});

// Parsed on its own so a bad PORT cannot break tool calls
const upstreamEnvSchema = z.object({
  OPENWEATHER_BASE_URL: z.string().url().default(DEFAULT_OPENWEATHER_BASE_URL),
  EXCHANGERATE_BASE_URL: z.string().url().default(DEFAULT_EXCHANGERATE_BASE_URL),
  WORLDTIME_BASE_URL: z.string().url().default(DEFAULT_WORLDTIME_BASE_URL),
});

export type TransportKind = z.infer<typeof serverEnvSchema>['MCP_TRANSPORT'];

export interface ServerConfig {
  port: number;
  transport: TransportKind;
}

/**
 * Base URLs of the upstream APIs. Overridable so the tools can be pointed at
 * a proxy or a sandbox.
 */
export interface UpstreamConfig {
  openWeatherBaseUrl: string;
  exchangeRateBaseUrl: string;
  worldTimeBaseUrl: string;
}

function parseEnv<T extends z.ZodTypeAny>(schema: T, env: NodeJS.ProcessEnv): z.infer<T> {
  // Treat empty strings as unset so `.env` templates with blank values fall back to defaults
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));
  return schema.parse(present);
}

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = parseEnv(serverEnvSchema, env);
  return {
    port: parsed.PORT,
    transport: parsed.MCP_TRANSPORT,
  };
}

/**
 * Read on every tool call, like the credentials, so tests and operators can
 * change the environment without restarting.
 */
export function loadUpstreamConfig(env: NodeJS.ProcessEnv = process.env): UpstreamConfig {
  const parsed = parseEnv(upstreamEnvSchema, env);
  return {
    openWeatherBaseUrl: parsed.OPENWEATHER_BASE_URL.replace(/\/+$/, ''),
    exchangeRateBaseUrl: parsed.EXCHANGERATE_BASE_URL.replace(/\/+$/, ''),
    worldTimeBaseUrl: parsed.WORLDTIME_BASE_URL.replace(/\/+$/, ''),
  };
}

/**
 * Returns the named credential, or undefined when it is unset or blank.
 */
export function readCredential(
  name: 'OPENWEATHER_API_KEY' | 'EXCHANGERATE_API_KEY',
  env: NodeJS.ProcessEnv = process.env
): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}
