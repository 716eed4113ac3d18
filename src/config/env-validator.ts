/**
 * Runtime configuration validator.
 *
 * Checks the effective value of every key in {@link CONFIG_SCHEMA} (env over
 * config file) and reports format violations with remediation hints.
 */

import { CONFIG_SCHEMA, LOG_LEVELS } from './env-schema.js';
import type { ConfigKeySpec } from './env-schema.js';
import { getConfigValue } from './json-config.js';

export interface ConfigIssue {
  key: string;
  class: 'format_error';
  message: string;
  remediation: string;
}

export interface ConfigValidationResult {
  ok: boolean;
  /** Keys set explicitly through the environment. */
  envKeys: string[];
  /** Keys whose effective value is the built-in default. */
  defaultedKeys: string[];
  issues: ConfigIssue[];
  validatedAt: string;
}

function isInteger(raw: string): boolean {
  return /^-?\d+$/.test(raw);
}

function formatError(spec: ConfigKeySpec, raw: string): string | null {
  switch (spec.format) {
    case 'port': {
      const parsed = Number(raw);
      if (!isInteger(raw) || parsed < 1 || parsed > 65535) {
        return `${spec.key} must be an integer in range 1–65535, got '${raw}'.`;
      }
      return null;
    }
    case 'positive_integer':
      if (!isInteger(raw) || Number(raw) < 1) {
        return `${spec.key} must be a positive integer, got '${raw}'.`;
      }
      if (spec.max !== undefined && Number(raw) > spec.max) {
        return `${spec.key} must be at most ${spec.max}, got '${raw}'.`;
      }
      return null;
    case 'non_negative_integer':
      if (!isInteger(raw) || Number(raw) < 0) {
        return `${spec.key} must be a non-negative integer, got '${raw}'.`;
      }
      return null;
    case 'http_url': {
      try {
        const parsed = new URL(raw);
        if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
          return `${spec.key} must use http or https, got '${parsed.protocol}'.`;
        }
      } catch {
        return `${spec.key} must be an absolute URL, got '${raw}'.`;
      }
      return null;
    }
    case 'log_level':
      if (!LOG_LEVELS.some((level) => level === raw.toLowerCase())) {
        return `${spec.key} must be one of ${LOG_LEVELS.join(', ')}, got '${raw}'.`;
      }
      return null;
    case 'string':
      return null;
  }
}

/**
 * Validate the effective runtime configuration.
 *
 * @param now - Injectable clock. Defaults to `new Date()`.
 */
export function validateRuntimeConfig(
  now: () => Date = () => new Date(),
): ConfigValidationResult {
  const issues: ConfigIssue[] = [];
  const envKeys: string[] = [];
  const defaultedKeys: string[] = [];

  for (const spec of CONFIG_SCHEMA) {
    const envValue = process.env[spec.key];
    if (envValue !== undefined && envValue.trim() !== '') {
      envKeys.push(spec.key);
    }

    const raw = getConfigValue(spec.key) ?? spec.defaultValue;
    if (raw === spec.defaultValue) {
      defaultedKeys.push(spec.key);
    }

    const message = formatError(spec, raw);
    if (message) {
      issues.push({ key: spec.key, class: 'format_error', message, remediation: spec.remediation });
    }
  }

  return {
    ok: issues.length === 0,
    envKeys: envKeys.sort(),
    defaultedKeys: defaultedKeys.sort(),
    issues,
    validatedAt: now().toISOString(),
  };
}

/**
 * Throw when the configuration has format errors. Safe to call during startup.
 */
export function assertRuntimeConfig(
  now: () => Date = () => new Date(),
): ConfigValidationResult {
  const result = validateRuntimeConfig(now);

  if (!result.ok) {
    const reasons = result.issues.map((issue) => issue.message).join(' | ');
    throw new Error(`Runtime config validation failed: ${reasons}`);
  }

  return result;
}
