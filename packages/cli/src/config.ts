/**
 * CLI configuration loading
 *
 * Loads configuration from .env files, searching from the current directory
 * up to the filesystem root, then overlays the process environment.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { ENVIRONMENTS, LOG_LEVELS, type Environment, type LogLevel } from '@chatplate/logger';
import { z } from 'zod';

export interface ChatplateConfig {
  eosToken?: string;
  bosToken?: string;
  logLevel?: LogLevel;
  environment?: Environment;
}

const envSchema = z.object({
  CHATPLATE_EOS_TOKEN: z.string().optional(),
  CHATPLATE_BOS_TOKEN: z.string().optional(),
  CHATPLATE_LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  CHATPLATE_ENV: z.enum(ENVIRONMENTS).optional(),
});

/**
 * Parse a .env file into a key-value object
 */
export function parseEnvFile(content: string): Record<string, string> {
  const result: Record<string, string> = {};

  for (const line of content.split('\n')) {
    const trimmed = line.trim();

    // Skip empty lines and comments
    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }

    const eqIndex = trimmed.indexOf('=');
    if (eqIndex === -1) {
      continue;
    }

    const key = trimmed.slice(0, eqIndex).trim();
    let value = trimmed.slice(eqIndex + 1).trim();

    // Remove surrounding quotes if present
    if (
      value.length >= 2 &&
      ((value.startsWith('"') && value.endsWith('"')) ||
        (value.startsWith("'") && value.endsWith("'")))
    ) {
      value = value.slice(1, -1);
    }

    result[key] = value;
  }

  return result;
}

/**
 * Find and load the nearest .env file, searching from startDir up to root
 */
export function findEnvFile(startDir: string): Record<string, string> | null {
  let currentDir = path.resolve(startDir);

  while (true) {
    const envPath = path.join(currentDir, '.env');

    if (fs.existsSync(envPath) && fs.statSync(envPath).isFile()) {
      return parseEnvFile(fs.readFileSync(envPath, 'utf-8'));
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      // Reached filesystem root
      return null;
    }
    currentDir = parentDir;
  }
}

/**
 * Load chatplate configuration from environment and .env files
 *
 * Priority (highest to lowest):
 * 1. Process environment variables
 * 2. .env file (searched from cwd upward)
 *
 * @throws {Error} When a variable holds an unsupported value
 */
export function loadConfig(
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env,
): ChatplateConfig {
  const merged: Record<string, string> = { ...findEnvFile(cwd) };

  for (const key of Object.keys(envSchema.shape)) {
    const value = env[key];
    if (value !== undefined) {
      merged[key] = value;
    }
  }

  const result = envSchema.safeParse(merged);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }

  const parsed = result.data;
  return {
    eosToken: parsed.CHATPLATE_EOS_TOKEN,
    bosToken: parsed.CHATPLATE_BOS_TOKEN,
    logLevel: parsed.CHATPLATE_LOG_LEVEL,
    environment: parsed.CHATPLATE_ENV,
  };
}
