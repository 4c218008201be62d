import { dirname, join, isAbsolute } from 'path';
import { fileURLToPath } from 'url';

const __dirname = dirname(fileURLToPath(import.meta.url));

/**
 * Validates that a value parses as a positive integer
 */
function isPositiveInteger(value: string): boolean {
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0;
}

/**
 * Validates environment variable configuration at startup.
 * Throws an error if critical configuration is invalid.
 */
function validateEnvConfig(): void {
  const errors: string[] = [];

  // Stack roots are joined with app names, so they must be absolute
  for (const name of ['STACKS_PATH', 'HOST_STACKS_PATH'] as const) {
    const value = process.env[name];
    if (value && !isAbsolute(value)) {
      errors.push(`${name} must be an absolute path: ${value}`);
    }
  }

  const timeout = process.env.NETWORK_COMMAND_TIMEOUT_MS;
  if (timeout && !isPositiveInteger(timeout)) {
    errors.push(`NETWORK_COMMAND_TIMEOUT_MS must be a positive integer: ${timeout}`);
  }

  const logLevel = process.env.LOG_LEVEL;
  const levels = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];
  if (logLevel && !levels.includes(logLevel)) {
    errors.push(`LOG_LEVEL must be one of ${levels.join(', ')}: ${logLevel}`);
  }

  if (errors.length > 0) {
    throw new Error(
      'Invalid environment configuration:\n  - ' + errors.join('\n  - ')
    );
  }
}

const nodeEnv = process.env.NODE_ENV || 'production';
const isDevelopment = nodeEnv === 'development';
const isTest = nodeEnv === 'test';

// Default values
const DEFAULT_STACKS_PATH = '/stacks';
const DEFAULT_NETWORK_COMMAND_TIMEOUT_MS = 15_000;

const stacksPath = process.env.STACKS_PATH || DEFAULT_STACKS_PATH;

export const config = {
  nodeEnv,
  isDevelopment,
  isTest,

  logLevel: process.env.LOG_LEVEL || (isTest ? 'silent' : isDevelopment ? 'debug' : 'info'),

  paths: {
    // Stack directories as seen by this process
    stacks: stacksPath,
    // Same directories as seen by the Docker host; differs when running in a container
    hostStacks: process.env.HOST_STACKS_PATH || stacksPath,
    blueprints: process.env.BLUEPRINTS_PATH || join(__dirname, '../../../blueprints'),
    presets: process.env.PRESETS_PATH || join(__dirname, '../../../presets'),
  },

  docker: {
    bin: process.env.DOCKER_BIN || 'docker',
    networkCommandTimeoutMs: parseInt(
      process.env.NETWORK_COMMAND_TIMEOUT_MS || String(DEFAULT_NETWORK_COMMAND_TIMEOUT_MS),
      10
    ),
  },
};

// Validate environment configuration at module load
validateEnvConfig();

export type Config = typeof config;
