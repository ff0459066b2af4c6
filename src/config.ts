/**
 * Configuration module.
 *
 * Loads config from config/config.{VIMDOCGEN_CONFIG}.json
 * Provides typed access to configuration values.
 */

import fs from "fs-extra";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import { Logger } from "./types.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/** config/ lives beside src/ (and dist/) */
export const configDir = path.resolve(__dirname, "..", "config");

const conversionSchema = z.object({
  contentSelector: z.string().min(1).optional(),
  selectorsToIgnore: z.array(z.string().min(1)).default([]),
  ignoredLinkTargets: z.array(z.string()).default([]),
  externalDocPrefix: z.string().optional(),
  modeline: z.string().optional(),
  textWidth: z.number().int().min(20).max(400).optional(),
});

const configSchema = z.object({
  port: z.number().int().positive().default(3000),
  contentDir: z.string().default("content"),
  conversion: conversionSchema.default({}),
});

export type AppConfig = z.infer<typeof configSchema>;
export type ConversionDefaults = z.infer<typeof conversionSchema>;

let cachedConfig: AppConfig | null = null;

function configFileName(): string {
  const configEnv = process.env.VIMDOCGEN_CONFIG ?? "default";
  return `config.${configEnv}.json`;
}

/**
 * Validate raw configuration data.
 */
export function parseConfig(raw: unknown, source = "configuration"): AppConfig {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const problems = result.error.issues
      .map(issue => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid ${source}: ${problems}`);
  }
  return result.data;
}

/**
 * Load configuration from file. Safe to call multiple times.
 */
export async function loadConfig(dir: string = configDir, logger: Logger = console): Promise<AppConfig> {
  if (cachedConfig) {
    return cachedConfig;
  }

  const fileName = configFileName();
  const configPath = path.join(dir, fileName);

  if (await fs.pathExists(configPath)) {
    const raw: unknown = await fs.readJson(configPath);
    cachedConfig = parseConfig(raw, fileName);
    logger.info(`Loaded config from ${fileName}`);
  } else {
    logger.warn(`Config file ${fileName} not found, using defaults`);
    cachedConfig = parseConfig({});
  }

  return cachedConfig;
}

/**
 * Get configuration synchronously (must call loadConfig first during bootstrap).
 */
export function getConfig(): AppConfig {
  return cachedConfig ?? parseConfig({});
}

/**
 * Forget the cached configuration (tests switch between config files).
 */
export function resetConfig(): void {
  cachedConfig = null;
}

/**
 * Get server port from config.
 */
export function getServerPort(): number {
  const config = getConfig();
  return Number(process.env.PORT ?? config.port);
}
