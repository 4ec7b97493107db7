/**
 * Orchestration Configuration
 *
 * Environment-based configuration. Entry points load `.env` with dotenv before
 * calling the loader.
 */

import { config as dotenvConfig } from 'dotenv';
import { parseLogLevel } from './logger';
import type { LogLevel } from './logger';

export interface RemoteValidatorConfig {
  url: string;
  fhirVersion: string;
  locale: string;
  timeoutMs: number;
}

export interface OrchestrationConfig {
  remoteValidator: RemoteValidatorConfig;

  /** Default profile URL for sessions that do not name one */
  profileUrl?: string;

  /** Default strategy descriptor, e.g. {"engines":["HAPI"]} */
  validationStrategy?: string;

  logging: {
    level: LogLevel;
    json: boolean;
  };
}

export const DEFAULT_REMOTE_VALIDATOR: RemoteValidatorConfig = {
  url: 'https://validator.fhir.org/validate',
  fhirVersion: '4.0.1',
  locale: 'en',
  timeoutMs: 120_000,
};

/**
 * Load `.env` from the working directory (or `path`) into process.env.
 */
export function loadEnvFile(path?: string): void {
  dotenvConfig(path ? { path } : {});
}

export function loadOrchestrationConfigFromEnv(env: NodeJS.ProcessEnv = process.env): OrchestrationConfig {
  return {
    remoteValidator: {
      url: env.REMOTE_VALIDATOR_URL || DEFAULT_REMOTE_VALIDATOR.url,
      fhirVersion: env.REMOTE_VALIDATOR_FHIR_VERSION || DEFAULT_REMOTE_VALIDATOR.fhirVersion,
      locale: env.REMOTE_VALIDATOR_LOCALE || DEFAULT_REMOTE_VALIDATOR.locale,
      timeoutMs: parseInt(env.REMOTE_VALIDATOR_TIMEOUT_MS || String(DEFAULT_REMOTE_VALIDATOR.timeoutMs), 10),
    },
    profileUrl: env.FHIR_PROFILE_URL || undefined,
    validationStrategy: env.VALIDATION_STRATEGY || undefined,
    logging: {
      level: parseLogLevel(env.LOG_LEVEL),
      json: env.LOG_JSON === 'true',
    },
  };
}

function isHttpUrl(value: string): boolean {
  try {
    const { protocol } = new URL(value);
    return protocol === 'http:' || protocol === 'https:';
  } catch {
    return false;
  }
}

/**
 * Validate configuration
 */
export function validateConfig(config: OrchestrationConfig): string[] {
  const errors: string[] = [];

  if (!isHttpUrl(config.remoteValidator.url)) {
    errors.push(`REMOTE_VALIDATOR_URL must be an http(s) URL (got "${config.remoteValidator.url}")`);
  }

  if (!Number.isInteger(config.remoteValidator.timeoutMs) || config.remoteValidator.timeoutMs <= 0) {
    errors.push('REMOTE_VALIDATOR_TIMEOUT_MS must be a positive integer');
  }

  if (config.profileUrl !== undefined && !isHttpUrl(config.profileUrl)) {
    errors.push(`FHIR_PROFILE_URL must be an http(s) URL (got "${config.profileUrl}")`);
  }

  return errors;
}
