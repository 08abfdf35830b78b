import fs from 'fs';
import path from 'path';
import os from 'os';
import type { ZodError } from 'zod';
import { CourierConfigSchema, isEmailProviderName, type SmtpSettings } from './schema.js';
import type { CourierConfig, ConfigSource } from './types.js';
import { PATH_CONSTANTS } from './constants.js';
import { ConfigError, getErrorMessage } from '../utils/error-utils.js';
import { log } from '../utils/logger.js';

const ENV_REFERENCE = /^\$\{ENV:([A-Za-z_][A-Za-z0-9_]*)\}$/;

export interface LoadConfigOptions {
  /** Explicit project config file; must exist when given */
  configPath?: string;
  /** Base for relative paths (defaults to process.cwd()) */
  cwd?: string;
}

function getGlobalConfigDir(): string {
  return path.join(process.env.COURIER_HOME || os.homedir(), '.courier');
}

/**
 * Global config file path (~/.courier/config.json, or under COURIER_HOME)
 */
export function getGlobalConfigPath(): string {
  return path.join(getGlobalConfigDir(), 'config.json');
}

/**
 * Project config file path, honouring an explicit --config
 */
export function getProjectConfigPath(options: LoadConfigOptions = {}): string {
  const cwd = path.resolve(options.cwd || '.');
  return options.configPath
    ? path.resolve(cwd, options.configPath)
    : path.join(cwd, PATH_CONSTANTS.PROJECT_CONFIG_FILE);
}

function formatZodError(error: ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Parse and validate one JSON config file.
 * @throws ConfigError when the file is unreadable, not JSON, or fails the schema
 */
export function readConfigFile(filePath: string): CourierConfig {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${filePath}: ${getErrorMessage(error)}`, filePath);
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Invalid JSON in config file ${filePath}: ${getErrorMessage(error)}`, filePath);
  }

  const parsed = CourierConfigSchema.safeParse(data);
  if (!parsed.success) {
    throw new ConfigError(`Invalid config file ${filePath}: ${formatZodError(parsed.error)}`, filePath);
  }
  return parsed.data;
}

/**
 * Read global configuration from ~/.courier/config.json
 * @readonly Never modifies files
 */
export function readGlobalConfig(): CourierConfig | null {
  const globalPath = getGlobalConfigPath();
  if (!fs.existsSync(globalPath)) {
    return null;
  }
  return readConfigFile(globalPath);
}

/**
 * Read project-local configuration from .courier/config.json or --config
 * @readonly Never modifies files
 */
export function readProjectConfig(options: LoadConfigOptions = {}): CourierConfig | null {
  const configPath = getProjectConfigPath(options);
  if (!fs.existsSync(configPath)) {
    if (options.configPath) {
      throw new ConfigError(`Config file not found: ${configPath}`, configPath);
    }
    return null;
  }
  return readConfigFile(configPath);
}

function readPositiveNumber(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number.parseFloat(raw);
  if (!Number.isFinite(value) || value < 0) {
    log.warn(`Ignoring invalid ${name}`, { value: raw });
    return undefined;
  }
  return value;
}

/**
 * Read configuration from environment variables
 * @readonly Never modifies files or environment
 */
export function readEnvConfig(): CourierConfig {
  const config: CourierConfig = {};

  const providerRaw = (process.env.COURIER_EMAIL_PROVIDER || process.env.EMAIL_PROVIDER || '').trim().toLowerCase();
  if (providerRaw) {
    if (isEmailProviderName(providerRaw)) {
      config.email = { ...config.email, provider: providerRaw };
    } else {
      log.warn('Ignoring unknown email provider from environment', { provider: providerRaw });
    }
  }

  const smtp: SmtpSettings = {};
  if (process.env.COURIER_SMTP_HOST) smtp.host = process.env.COURIER_SMTP_HOST;
  if (process.env.COURIER_SMTP_USER) smtp.username = process.env.COURIER_SMTP_USER;
  if (process.env.COURIER_SMTP_PASSWORD) smtp.password = process.env.COURIER_SMTP_PASSWORD;
  if (process.env.COURIER_SMTP_SENDER) smtp.defaultSender = process.env.COURIER_SMTP_SENDER;
  if (process.env.COURIER_SMTP_PORT) {
    const port = Number.parseInt(process.env.COURIER_SMTP_PORT, 10);
    if (Number.isInteger(port) && port > 0) {
      smtp.port = port;
    } else {
      log.warn('Ignoring invalid COURIER_SMTP_PORT', { value: process.env.COURIER_SMTP_PORT });
    }
  }
  if (Object.keys(smtp).length > 0) {
    config.email = { ...config.email, smtp };
  }

  const debounce = readPositiveNumber('COURIER_DEBOUNCE_SECONDS');
  const cooldown = readPositiveNumber('COURIER_COOLDOWN_SECONDS');
  if (debounce !== undefined || cooldown !== undefined) {
    config.watching = {
      settings: {
        ...(debounce !== undefined ? { debounceDelaySeconds: debounce } : {}),
        ...(cooldown !== undefined ? { cooldownSeconds: cooldown } : {})
      }
    };
  }

  if (process.env.COURIER_ACTIVITY_LOG) {
    config.logging = { activityLog: process.env.COURIER_ACTIVITY_LOG };
  }

  return config;
}

/**
 * Deep merge configuration objects
 * Later configs override earlier ones; directory lists are replaced, not merged
 */
function deepMerge(...configs: (CourierConfig | null)[]): CourierConfig {
  const result: CourierConfig = {};

  for (const config of configs) {
    if (!config) continue;

    if (config.email) {
      result.email = {
        ...result.email,
        ...config.email,
        ...(config.email.smtp || result.email?.smtp
          ? { smtp: { ...result.email?.smtp, ...config.email.smtp } }
          : {})
      };
    }

    if (config.watching) {
      result.watching = {
        ...result.watching,
        ...(config.watching.directories ? { directories: config.watching.directories } : {}),
        ...(config.watching.settings || result.watching?.settings
          ? { settings: { ...result.watching?.settings, ...config.watching.settings } }
          : {})
      };
    }

    if (config.logging) {
      result.logging = { ...result.logging, ...config.logging };
    }

    if (config.lockFile) {
      result.lockFile = config.lockFile;
    }
  }

  return result;
}

/**
 * Load merged configuration from all sources
 * Priority: env > project > global
 *
 * @readonly Never modifies config files
 * @throws ConfigError for unreadable or invalid files
 */
export function loadConfig(options: LoadConfigOptions = {}): CourierConfig {
  const global = readGlobalConfig();
  const project = readProjectConfig(options);
  const env = readEnvConfig();

  return deepMerge(global, project, env);
}

/**
 * Get configuration sources for debugging
 * @readonly Never modifies files
 */
export function getConfigSources(options: LoadConfigOptions = {}): ConfigSource {
  return {
    global: readGlobalConfig(),
    project: readProjectConfig(options),
    env: readEnvConfig()
  };
}

/**
 * Resolve a `${ENV:NAME}` reference; other strings pass through unchanged
 */
export function resolveEnvReference(value: string): string;
export function resolveEnvReference(value: string | null | undefined): string | undefined;
export function resolveEnvReference(value: string | null | undefined): string | undefined {
  if (value === null || value === undefined) return undefined;
  const match = ENV_REFERENCE.exec(value.trim());
  if (!match) return value;
  return process.env[match[1]] ?? '';
}

/**
 * Write project-local configuration (CLI only)
 * This is the ONLY function that writes config to disk
 */
export function saveProjectConfig(config: CourierConfig, options: LoadConfigOptions = {}): string {
  const configPath = getProjectConfigPath(options);
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, `${JSON.stringify(config, null, 2)}\n`);
  return configPath;
}

/**
 * Check if project config exists
 */
export function hasProjectConfig(options: LoadConfigOptions = {}): boolean {
  return fs.existsSync(getProjectConfigPath(options));
}
