/**
 * Configuration management for sensorcorr
 */

import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import { ConfigurationError } from '../errors/index.js';

// Load environment variables - try the working directory first, then the
// monorepo root (workspace scripts may run from a package directory)
const __dirname = dirname(fileURLToPath(import.meta.url));
const monorepoRoot = resolve(__dirname, '../../../../');

const envPaths = [
  resolve(process.cwd(), '.env'),
  resolve(monorepoRoot, '.env'),
];

for (const envPath of envPaths) {
  // dotenv never overrides variables that are already set
  dotenvConfig({ path: envPath });
}

// Configuration schema
const configSchema = z.object({
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  serviceName: z.string().min(1).default('sensorcorr'),
});

export type Config = z.infer<typeof configSchema>;

function readRawConfig() {
  return {
    nodeEnv: process.env.NODE_ENV || undefined,
    logLevel: process.env.LOG_LEVEL || undefined,
    serviceName: process.env.SERVICE_NAME || undefined,
  };
}

function formatIssues(error: z.ZodError): string[] {
  return error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
}

// Parse and validate configuration
function loadConfig(): Config {
  const parsed = configSchema.safeParse(readRawConfig());
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid configuration: ${formatIssues(parsed.error).join('; ')}`
    );
  }
  return parsed.data;
}

// Singleton config instance
let configInstance: Config | null = null;

export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

// Schema defaults, used where a bad environment must not stop the caller
export function getDefaultConfig(): Config {
  return configSchema.parse({});
}

// For testing - reset config
export function resetConfig(): void {
  configInstance = null;
}

// Validate config without loading (for startup checks)
export function validateConfig(): { valid: boolean; errors?: string[] } {
  const parsed = configSchema.safeParse(readRawConfig());
  if (parsed.success) {
    return { valid: true };
  }
  return { valid: false, errors: formatIssues(parsed.error) };
}
