/**
 * Configuration Parser
 *
 * Builds the immutable CheckConfig for one run from built-in defaults,
 * an optional YAML/JSON config file and command-line flags, in that order
 * of precedence (flags win).
 *
 * Example check.yml:
 *
 *   url: https://example.com/health
 *   timeout: 5
 *   redirect_ok: true
 *   query: '"status":"up"'
 */

import { readFile } from 'fs/promises';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError } from './errors.js';

// ============================================================================
// Schemas
// ============================================================================

/** Longest deadline a Node timer can hold (2^31 - 1 ms) */
export const MAX_TIMEOUT_SECONDS = Math.floor((2 ** 31 - 1) / 1000);

export const CheckFileSchema = z
  .object({
    url: z.string().optional(),
    timeout: z.number().int().min(0).max(MAX_TIMEOUT_SECONDS).optional(),
    redirect_ok: z.boolean().optional(),
    response_code: z.number().int().min(0).max(999).optional(),
    query: z.string().optional(),
    negquery: z.string().optional(),
  })
  .strict();

export const CheckConfigSchema = z.object({
  url: z.string(),
  timeoutSeconds: z.number().int().min(0).max(MAX_TIMEOUT_SECONDS),
  redirectAccepted: z.boolean(),
  expectedStatusCode: z.number().int().min(0).max(999).optional(),
  requiredPattern: z.string().optional(),
  forbiddenPattern: z.string().optional(),
});

// ============================================================================
// Types
// ============================================================================

export type CheckFileConfig = z.infer<typeof CheckFileSchema>;
export type CheckConfig = Readonly<z.infer<typeof CheckConfigSchema>>;

// ============================================================================
// Default Config
// ============================================================================

export const DEFAULT_CONFIG = {
  timeout: 15,
  redirect_ok: false,
} as const satisfies CheckFileConfig;

// ============================================================================
// Config Parser
// ============================================================================

export class ConfigParser {
  /**
   * Load and parse a config file
   */
  async loadFile(path: string): Promise<CheckFileConfig> {
    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`cannot read config file ${path}: ${reason}`, { cause: error });
    }
    return this.parse(content, path);
  }

  /**
   * Parse config from string content. `.json` files are JSON, anything else YAML.
   */
  parse(content: string, filename: string = 'config'): CheckFileConfig {
    let parsed: unknown;

    try {
      parsed = filename.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`${filename}: ${reason}`, { cause: error });
    }

    // An empty YAML document parses to null
    const result = CheckFileSchema.safeParse(parsed ?? {});
    if (!result.success) {
      throw ConfigError.fromZod(result.error, filename);
    }
    return result.data;
  }

  /**
   * Merge defaults, file values and flag values into a frozen CheckConfig
   */
  resolve(file: CheckFileConfig = {}, overrides: CheckFileConfig = {}): CheckConfig {
    const merged: CheckFileConfig = { ...DEFAULT_CONFIG, ...file, ...overrides };

    const result = CheckConfigSchema.safeParse({
      url: merged.url ?? '',
      timeoutSeconds: merged.timeout,
      redirectAccepted: merged.redirect_ok,
      expectedStatusCode: merged.response_code,
      requiredPattern: merged.query,
      forbiddenPattern: merged.negquery,
    });
    if (!result.success) {
      throw ConfigError.fromZod(result.error, 'config');
    }

    return Object.freeze(result.data);
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createConfigParser(): ConfigParser {
  return new ConfigParser();
}

/**
 * Build the run's config from an optional file plus flag overrides
 */
export async function loadCheckConfig(
  overrides: CheckFileConfig,
  configPath?: string
): Promise<CheckConfig> {
  const parser = new ConfigParser();
  const file = configPath ? await parser.loadFile(configPath) : {};
  return parser.resolve(file, overrides);
}
