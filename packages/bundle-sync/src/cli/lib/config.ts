/**
 * Bundle Sync CLI Configuration Management
 *
 * Loads configuration from .bundle-syncrc (YAML or JSON) with environment
 * variable overrides and defaults, and turns it into the immutable
 * SyncConfig the pipeline runs on.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (BUNDLE_SYNC_*)
 * 3. Config file (.bundle-syncrc or --config path)
 * 4. Default values
 *
 * Relative paths in a config file resolve against the file's directory.
 *
 * @module cli/lib/config
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { createSyncConfig } from '../../core/config.js';
import type { SyncConfig } from '../../core/config.js';
import { ConfigError, errorMessage } from '../../core/errors.js';

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * Full CLI configuration
 */
export interface CLIConfig {
  /** Pipeline configuration */
  readonly sync: SyncConfig;
  /** Enable verbose output */
  readonly verbose: boolean;
  /** Output as JSON */
  readonly json: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

const RepositorySchema = z.object({
  name: z.string().min(1),
  url: z.string().url(),
});

/**
 * Config file structure
 */
export const ConfigFileSchema = z
  .object({
    version: z.literal(1).default(1),
    root: z.string().optional(),
    paths: z
      .object({
        repository: z.string(),
        index: z.string(),
        declaration: z.string(),
        report: z.string(),
        bndJar: z.string(),
        indexFolders: z.array(z.string()),
      })
      .partial()
      .optional(),
    upstream: z
      .object({
        searchUrl: z.string().url(),
        centralRepositoryUrl: z.string().url(),
        browserUrl: z.string().url(),
        bundleHubApiUrl: z.string().url(),
        bundleHubRawUrl: z.string().url(),
        userAgent: z.string(),
        browserUserAgent: z.string(),
      })
      .partial()
      .optional(),
    network: z
      .object({
        metadataTimeoutMs: z.number(),
        downloadTimeoutMs: z.number(),
        maxRetries: z.number(),
        politenessDelayMs: z.number(),
      })
      .partial()
      .optional(),
    repositories: z.array(RepositorySchema).optional(),
    concurrency: z.number().optional(),
    defaultFolder: z.string().optional(),
    indexName: z.string().optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ============================================================================
// Configuration Loading
// ============================================================================

/**
 * Standard config file names to search for
 */
const CONFIG_FILE_NAMES = [
  '.bundle-syncrc',
  '.bundle-syncrc.yaml',
  '.bundle-syncrc.yml',
  '.bundle-syncrc.json',
];

/**
 * Find config file in a directory or its parents
 */
export function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    const parent = dirname(dir);
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

/**
 * Parse and validate config file content (YAML is a superset of JSON)
 *
 * @throws {ConfigError} On a syntax error or an unknown/mistyped key
 */
export function parseConfigFile(content: string, filePath: string): ConfigFile {
  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (error) {
    throw new ConfigError(`Cannot parse ${filePath}: ${errorMessage(error)}`, [filePath], {
      cause: error,
    });
  }

  const parsed = ConfigFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`
    );
    throw new ConfigError(`Invalid config file ${filePath}: ${issues.join('; ')}`, issues);
  }
  return parsed.data;
}

type Env = Readonly<Record<string, string | undefined>>;

/**
 * Environment variable reader bound to the BUNDLE_SYNC_ prefix
 */
function envReader(env: Env) {
  const get = (name: string): string | undefined => {
    const value = env[`BUNDLE_SYNC_${name}`];
    return value === undefined || value === '' ? undefined : value;
  };

  return {
    string: get,
    bool(name: string): boolean | undefined {
      const value = get(name);
      if (value === undefined) return undefined;
      return value.toLowerCase() === 'true' || value === '1';
    },
    number(name: string): number | undefined {
      const value = get(name);
      if (value === undefined) return undefined;
      const num = parseInt(value, 10);
      if (isNaN(num)) {
        throw new ConfigError(`BUNDLE_SYNC_${name} must be a number, got '${value}'`, [
          `BUNDLE_SYNC_${name}`,
        ]);
      }
      return num;
    },
  };
}

/**
 * Load configuration options
 */
export interface LoadConfigOptions {
  /** Explicit config file path */
  readonly configPath?: string;
  /** CLI flag overrides */
  readonly overrides?: {
    readonly root?: string;
    readonly verbose?: boolean;
    readonly json?: boolean;
    readonly timeout?: number;
    readonly concurrency?: number;
  };
  /** Environment (default: process.env) */
  readonly env?: Env;
  /** Search start and relative path base (default: process.cwd()) */
  readonly cwd?: string;
}

/**
 * Load and merge configuration from all sources
 *
 * @throws {ConfigError} If a file is missing or any merged value is invalid
 */
export function loadConfig(options: LoadConfigOptions = {}): CLIConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = envReader(options.env ?? process.env);

  let configPath: string | null = null;
  let fileConfig: ConfigFile = { version: 1 };

  const explicitPath = options.configPath ?? env.string('CONFIG');
  if (explicitPath) {
    configPath = resolve(cwd, explicitPath);
    if (!existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${configPath}`, [configPath]);
    }
  } else {
    configPath = findConfigFile(cwd);
  }

  if (configPath) {
    fileConfig = parseConfigFile(readFileSync(configPath, 'utf-8'), configPath);
  }

  const baseDir = configPath ? dirname(configPath) : cwd;
  const fromFile = (path: string | undefined): string | undefined =>
    path === undefined ? undefined : resolve(baseDir, path);
  const fromEnv = (path: string | undefined): string | undefined =>
    path === undefined ? undefined : resolve(cwd, path);

  const root =
    (options.overrides?.root === undefined ? undefined : resolve(cwd, options.overrides.root)) ??
    fromEnv(env.string('ROOT')) ??
    fromFile(fileConfig.root) ??
    baseDir;

  const filePaths = fileConfig.paths ?? {};
  const sync = createSyncConfig({
    root,
    paths: dropUndefined({
      repository: fromEnv(env.string('REPOSITORY_DIR')) ?? fromFile(filePaths.repository),
      index: fromEnv(env.string('INDEX')) ?? fromFile(filePaths.index),
      declaration: fromEnv(env.string('DECLARATION')) ?? fromFile(filePaths.declaration),
      report: fromEnv(env.string('REPORT')) ?? fromFile(filePaths.report),
      bndJar: fromEnv(env.string('BND_JAR')) ?? fromFile(filePaths.bndJar),
      indexFolders: filePaths.indexFolders,
    }),
    upstream: dropUndefined({ ...fileConfig.upstream }),
    network: dropUndefined({
      ...fileConfig.network,
      metadataTimeoutMs:
        options.overrides?.timeout ??
        env.number('TIMEOUT') ??
        fileConfig.network?.metadataTimeoutMs,
      downloadTimeoutMs: env.number('DOWNLOAD_TIMEOUT') ?? fileConfig.network?.downloadTimeoutMs,
      politenessDelayMs: env.number('POLITENESS_MS') ?? fileConfig.network?.politenessDelayMs,
    }),
    repositories: fileConfig.repositories,
    concurrency:
      options.overrides?.concurrency ?? env.number('CONCURRENCY') ?? fileConfig.concurrency,
    defaultFolder: fileConfig.defaultFolder,
    indexName: fileConfig.indexName,
  });

  return {
    sync,
    verbose: options.overrides?.verbose ?? env.bool('VERBOSE') ?? false,
    json: options.overrides?.json ?? env.bool('JSON') ?? false,
    configPath,
  };
}

/**
 * Remove keys whose value is undefined so they don't mask defaults in a spread
 */
function dropUndefined<T extends object>(value: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key of Object.keys(value)) {
    if (isKeyOf(value, key) && value[key] !== undefined) {
      result[key] = value[key];
    }
  }
  return result;
}

function isKeyOf<T extends object>(value: T, key: PropertyKey): key is keyof T {
  return key in value;
}
