/**
 * Session config defaults, validation, and file loading.
 *
 * @module
 */

import { readFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import { LOG_LEVEL_NAMES } from '../utils/logger.js';
import { getErrorMessage } from '../types/errors.js';
import { ConfigLoadError, ConfigValidationError } from './errors.js';
import type { SessionConfig, SessionConfigInput } from './types.js';

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_SESSION_CONFIG: Readonly<SessionConfig> = {
  rpcMaxHaRetry: 15,
  rpcTimeoutMs: 3_600_000,
  rpcConnectTimeoutMs: 600_000,
  rpcMaxIdleMs: 10_000,
  rpcPingTimeoutMs: 10_000,
  logLevel: 'warn',
};

export const CONFIG_PATH_ENV = 'METADATA_HA_CONFIG';

export function getDefaultConfigPath(): string {
  return process.env[CONFIG_PATH_ENV] ?? join(homedir(), '.metadata-ha', 'config.json');
}

// ============================================================================
// Validation
// ============================================================================

const timeoutMs = z.number().int().positive();

const sessionConfigSchema = z
  .object({
    rpcMaxHaRetry: z.number().int().min(0).max(1000),
    rpcTimeoutMs: timeoutMs,
    rpcConnectTimeoutMs: timeoutMs,
    rpcMaxIdleMs: timeoutMs,
    rpcPingTimeoutMs: timeoutMs,
    logLevel: z.enum(LOG_LEVEL_NAMES),
  })
  .partial()
  .strict();

export function validateSessionConfig(obj: unknown): { valid: boolean; errors: string[] } {
  const result = sessionConfigSchema.safeParse(obj);
  if (result.success) {
    return { valid: true, errors: [] };
  }
  const errors = result.error.issues.map(
    (issue) => `${issue.path.length > 0 ? issue.path.join('.') : 'config'}: ${issue.message}`,
  );
  return { valid: false, errors };
}

/**
 * Validate `input` and fill in defaults.
 *
 * @throws {ConfigValidationError} listing every invalid field
 */
export function resolveSessionConfig(input: unknown = {}): SessionConfig {
  const result = sessionConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigValidationError(validateSessionConfig(input).errors);
  }
  const parsed: SessionConfigInput = result.data;
  return { ...DEFAULT_SESSION_CONFIG, ...stripUndefined(parsed) };
}

function stripUndefined(input: SessionConfigInput): SessionConfigInput {
  const out: SessionConfigInput = {};
  for (const [key, value] of Object.entries(input)) {
    if (value !== undefined) {
      Object.assign(out, { [key]: value });
    }
  }
  return out;
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Read a JSON session config from disk.
 *
 * @throws {ConfigLoadError} when the file cannot be read
 * @throws {ConfigValidationError} when it is not valid JSON or fails validation
 */
export async function loadSessionConfig(path: string = getDefaultConfigPath()): Promise<SessionConfig> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (err) {
    throw new ConfigLoadError(path, getErrorMessage(err));
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ConfigValidationError(['config: Invalid JSON']);
  }

  return resolveSessionConfig(parsed);
}
