import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import process from 'node:process';
import YAML from 'yaml';
import { ValidationError } from '../errors.js';
import { getSchemaRegistry } from '../services/schema-registry.js';
import { DEFAULT_HTTP_OPTIONS, type HttpOptions, type ProviderKind } from '../providers/types.js';

export interface RepositorySettings {
  default_branch?: string;
}

export interface HostSettings {
  /** Provider chosen at login; wins over hostname heuristics. */
  type?: ProviderKind;
  api_url?: string;
  /** Keyed by `owner/repo`. */
  repositories?: Record<string, RepositorySettings>;
}

export interface HttpSettings {
  timeout_ms?: number;
  retries?: number;
  max_pages?: number;
}

export interface UserConfig {
  hosts?: Record<string, HostSettings>;
  http?: HttpSettings;
}

export interface ConfigOptions {
  /** Overrides the resolved location; used by tests. */
  path?: string;
}

export function configPath(options: ConfigOptions = {}): string {
  if (options.path) return options.path;
  const fromEnv = process.env.GITPORT_CONFIG_PATH;
  if (fromEnv && fromEnv.trim() !== '') return fromEnv;
  const base = process.env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config');
  return path.join(base, 'gitport', 'config.yaml');
}

export function configDir(options: ConfigOptions = {}): string {
  return path.dirname(configPath(options));
}

/** Reads and validates the config file; a missing file is an empty config. */
export function loadConfig(options: ConfigOptions = {}): UserConfig {
  const file = configPath(options);
  if (!fs.existsSync(file)) {
    return {};
  }
  let parsed: unknown;
  try {
    parsed = YAML.parse(fs.readFileSync(file, 'utf8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`Config file ${file} is not valid YAML: ${message}`);
  }
  if (parsed === null || parsed === undefined) {
    return {};
  }
  return getSchemaRegistry().parse<UserConfig>(
    'config',
    parsed,
    `Invalid config file ${file}`,
    (message) => new ValidationError(message),
  );
}

export function saveConfig(config: UserConfig, options: ConfigOptions = {}): void {
  const file = configPath(options);
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, YAML.stringify(config), 'utf8');
}

export function httpOptionsFor(config: UserConfig, host: string): HttpOptions {
  return {
    timeoutMs: config.http?.timeout_ms ?? DEFAULT_HTTP_OPTIONS.timeoutMs,
    retries: config.http?.retries ?? DEFAULT_HTTP_OPTIONS.retries,
    maxPages: config.http?.max_pages ?? DEFAULT_HTTP_OPTIONS.maxPages,
    apiUrl: config.hosts?.[host]?.api_url,
  };
}

export function cachedDefaultBranch(config: UserConfig, host: string, fullName: string): string | undefined {
  return config.hosts?.[host]?.repositories?.[fullName]?.default_branch;
}

export function saveDefaultBranch(host: string, fullName: string, branch: string, options: ConfigOptions = {}): void {
  const config = loadConfig(options);
  const hosts = (config.hosts ??= {});
  const hostSettings = (hosts[host] ??= {});
  const repositories = (hostSettings.repositories ??= {});
  repositories[fullName] = { ...repositories[fullName], default_branch: branch };
  saveConfig(config, options);
}

export function setHostType(host: string, type: ProviderKind, options: ConfigOptions = {}): void {
  const config = loadConfig(options);
  const hosts = (config.hosts ??= {});
  hosts[host] = { ...hosts[host], type };
  saveConfig(config, options);
}
