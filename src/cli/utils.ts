/**
 * CLI Utilities
 *
 * Shared utilities for the infobot CLI commands.
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { homedir } from 'node:os';
import { isLogLevel, loggers, resetLoggerProvider, type LogLevel } from '../lib/logger.js';
import { ValidationError, errorMessage } from '../lib/errors.js';
import {
  type CliConfig,
  ConfigFileSchema,
  safeValidateCliConfig,
  formatValidationError,
} from '../lib/config-schema.js';

/** ANSI color codes */
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
} as const;

/** Color output helpers */
export const color = {
  bold: (s: string) => `${colors.bold}${s}${colors.reset}`,
  dim: (s: string) => `${colors.dim}${s}${colors.reset}`,
  green: (s: string) => `${colors.green}${s}${colors.reset}`,
  cyan: (s: string) => `${colors.cyan}${s}${colors.reset}`,
  error: (s: string) => `${colors.red}${colors.bold}${s}${colors.reset}`,
  warning: (s: string) => `${colors.yellow}${colors.bold}${s}${colors.reset}`,
};

/** Check if color output is supported */
export function supportsColor(): boolean {
  if (process.env['NO_COLOR'] || process.env['FORCE_COLOR'] === '0') {
    return false;
  }
  if (process.env['FORCE_COLOR']) {
    return true;
  }
  return process.stdout.isTTY ?? false;
}

/** Apply a color helper only when the terminal supports it */
export function paint(style: keyof typeof color, s: string): string {
  return supportsColor() ? color[style](s) : s;
}

// Re-export CliConfig type from schema
export type { CliConfig } from '../lib/config-schema.js';

/** Where loadConfig looks; defaults to the real process environment */
export interface ConfigSources {
  cwd?: string;
  home?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Load configuration from .infobotrc or environment
 *
 * Configuration is loaded from (in order of precedence):
 * 1. Environment variables (highest priority)
 * 2. .infobotrc in current directory
 * 3. .infobotrc in home directory (lowest priority)
 *
 * @throws {ValidationError} If configuration validation fails
 */
export async function loadConfig(sources: ConfigSources = {}): Promise<CliConfig> {
  const { cwd = process.cwd(), home = homedir(), env = process.env } = sources;
  const config: Record<string, unknown> = {};

  // First file found wins
  const configPaths = [join(cwd, '.infobotrc'), join(home, '.infobotrc')];

  for (const configPath of configPaths) {
    let data: string;
    try {
      data = await readFile(configPath, 'utf-8');
    } catch {
      continue;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(data);
    } catch (error) {
      throw new ValidationError(
        `Invalid configuration:\n${configPath} is not valid JSON (${errorMessage(error)})`
      );
    }

    const file = ConfigFileSchema.safeParse(parsed);
    if (!file.success) {
      throw new ValidationError(`Invalid configuration:\n${configPath} must contain a JSON object`);
    }
    Object.assign(config, file.data);
    loggers.cli.debug('Loaded config file', { path: configPath });
    break;
  }

  const envLang = env['INFOBOT_LANG'];
  if (envLang) {
    config['lang'] = envLang;
  }
  const envApiUrl = env['INFOBOT_API_URL'];
  if (envApiUrl) {
    config['apiUrl'] = envApiUrl;
  }
  const envUserAgent = env['INFOBOT_USER_AGENT'];
  if (envUserAgent) {
    config['userAgent'] = envUserAgent;
  }
  const envTimeout = env['INFOBOT_TIMEOUT_MS'];
  if (envTimeout) {
    config['timeoutMs'] = Number(envTimeout);
  }

  const result = safeValidateCliConfig(config);
  if (!result.success) {
    throw new ValidationError(`Invalid configuration:\n${formatValidationError(result.error)}`);
  }

  return result.data;
}

/**
 * Set the log level for a CLI run: debug with --verbose, else LOG_LEVEL,
 * else warn so answers are not buried in log lines
 */
export function configureLogging(verbose: boolean, env: NodeJS.ProcessEnv = process.env): LogLevel {
  const envLevel = env['LOG_LEVEL']?.toLowerCase();
  const level: LogLevel = verbose ? 'debug' : envLevel && isLogLevel(envLevel) ? envLevel : 'warn';
  resetLoggerProvider({ level });
  return level;
}

/**
 * Print error message and exit
 */
export function fatal(message: string, exitCode = 1): never {
  loggers.cli.error(message, undefined, 'fatal');
  console.error(`\n${paint('error', 'Error:')} ${message}\n`);
  process.exit(exitCode);
}
