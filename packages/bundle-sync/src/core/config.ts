/**
 * Bundle Sync Configuration
 *
 * One immutable configuration object is built at process start and passed
 * by reference into the reconciliation engine and its collaborators.
 * Nothing reads configuration from module-level state.
 *
 * @module core/config
 */

import { join, resolve } from 'node:path';
import { ConfigError } from './errors.js';
import type { RepositoryDescriptor } from './types.js';

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * Filesystem layout of the bundle repository
 */
export interface PathsConfig {
  /** Repository root (holds index.xml, dependencies.json, the report) */
  readonly root: string;
  /** Directory downloaded artifacts are written under */
  readonly repository: string;
  /** Repository index document */
  readonly index: string;
  /** Desired-state declaration */
  readonly declaration: string;
  /** Markdown report written after a full update */
  readonly report: string;
  /** Indexing tool JAR */
  readonly bndJar: string;
  /** Root-relative folders scanned for JARs when the index is rebuilt */
  readonly indexFolders: readonly string[];
}

/**
 * Upstream endpoints
 */
export interface UpstreamConfig {
  /** Central search API (solr select endpoint) */
  readonly searchUrl: string;
  /** Default registry download base URL */
  readonly centralRepositoryUrl: string;
  /** Public artifact browser, scraped as a fallback */
  readonly browserUrl: string;
  /** Bundle hub directory listing API */
  readonly bundleHubApiUrl: string;
  /** Bundle hub raw file base URL */
  readonly bundleHubRawUrl: string;
  readonly userAgent: string;
  /** User-Agent sent to the artifact browser, which rejects tool agents */
  readonly browserUserAgent: string;
}

/**
 * Network behaviour
 */
export interface NetworkConfig {
  /** Timeout for search, listing and scrape requests */
  readonly metadataTimeoutMs: number;
  /** Timeout for JAR downloads */
  readonly downloadTimeoutMs: number;
  /** Retries for transient failures (0 keeps one attempt per request) */
  readonly maxRetries: number;
  /** Minimum spacing between two requests to the same host */
  readonly politenessDelayMs: number;
}

export interface SyncConfig {
  readonly paths: PathsConfig;
  readonly upstream: UpstreamConfig;
  readonly network: NetworkConfig;
  /** Ordered fallback repositories */
  readonly repositories: readonly RepositoryDescriptor[];
  /** Maximum artifacts reconciled at once */
  readonly concurrency: number;
  /** Folder used when a declared artifact names none */
  readonly defaultFolder: string;
  /** Repository name passed to the indexing tool */
  readonly indexName: string;
  /** Byte size under which an HTML-looking payload is treated as an error page */
  readonly errorPageThresholdBytes: number;
}

// ============================================================================
// Defaults
// ============================================================================

export const MAVEN_CENTRAL: RepositoryDescriptor = {
  name: 'Maven Central',
  url: 'https://repo1.maven.org/maven2',
};

export const DEFAULT_REPOSITORIES: readonly RepositoryDescriptor[] = [
  MAVEN_CENTRAL,
  { name: 'Spring Plugins', url: 'https://repo.spring.io/plugins-release' },
  { name: 'Spring Libs', url: 'https://repo.spring.io/libs-release' },
  { name: 'JBoss', url: 'https://repository.jboss.org/nexus/content/repositories/releases' },
  { name: 'Sonatype', url: 'https://oss.sonatype.org/content/repositories/releases' },
];

export const DEFAULT_UPSTREAM: UpstreamConfig = {
  searchUrl: 'https://search.maven.org/solrsearch/select',
  centralRepositoryUrl: MAVEN_CENTRAL.url,
  browserUrl: 'https://mvnrepository.com/artifact',
  bundleHubApiUrl: 'https://api.github.com/repos/bndtools/bundle-hub/contents',
  bundleHubRawUrl: 'https://raw.githubusercontent.com/bndtools/bundle-hub/master',
  userAgent: 'bundle-sync/1.0',
  browserUserAgent: 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36',
};

export const DEFAULT_NETWORK: NetworkConfig = {
  metadataTimeoutMs: 30000,
  downloadTimeoutMs: 60000,
  maxRetries: 0,
  politenessDelayMs: 300,
};

/**
 * Build the default repository layout under `root`
 */
export function defaultPaths(root: string): PathsConfig {
  const absoluteRoot = resolve(root);
  const repository = join(absoluteRoot, 'dependencies');
  return {
    root: absoluteRoot,
    repository,
    index: join(absoluteRoot, 'index.xml'),
    declaration: join(absoluteRoot, 'dependencies.json'),
    report: join(absoluteRoot, 'unavailable_dependencies.md'),
    bndJar: join(repository, 'biz.aQute.bnd', 'biz.aQute.bnd-7.1.0.jar'),
    indexFolders: ['dependencies', 'release', 'snapshot'],
  };
}

// ============================================================================
// Construction
// ============================================================================

export interface SyncConfigOverrides {
  readonly root?: string;
  readonly paths?: Partial<PathsConfig>;
  readonly upstream?: Partial<UpstreamConfig>;
  readonly network?: Partial<NetworkConfig>;
  readonly repositories?: readonly RepositoryDescriptor[];
  readonly concurrency?: number;
  readonly defaultFolder?: string;
  readonly indexName?: string;
  readonly errorPageThresholdBytes?: number;
}

/**
 * Merge overrides onto the defaults, validate, and deep-freeze the result
 *
 * @throws {ConfigError} If any value is out of range
 */
export function createSyncConfig(overrides: SyncConfigOverrides = {}): SyncConfig {
  const config: SyncConfig = {
    paths: { ...defaultPaths(overrides.root ?? process.cwd()), ...overrides.paths },
    upstream: { ...DEFAULT_UPSTREAM, ...overrides.upstream },
    network: { ...DEFAULT_NETWORK, ...overrides.network },
    repositories: overrides.repositories ?? DEFAULT_REPOSITORIES,
    concurrency: overrides.concurrency ?? 1,
    defaultFolder: overrides.defaultFolder ?? 'misc',
    indexName: overrides.indexName ?? 'Bundle Dependencies',
    errorPageThresholdBytes: overrides.errorPageThresholdBytes ?? 1000,
  };

  validateSyncConfig(config);
  return deepFreeze(config);
}

/**
 * Validate configuration
 *
 * @throws {ConfigError} Listing every invalid field
 */
export function validateSyncConfig(config: SyncConfig): void {
  const issues: string[] = [];

  if (!Number.isInteger(config.concurrency) || config.concurrency < 1 || config.concurrency > 100) {
    issues.push('concurrency must be an integer between 1 and 100');
  }
  if (config.network.metadataTimeoutMs <= 0) {
    issues.push('network.metadataTimeoutMs must be positive');
  }
  if (config.network.downloadTimeoutMs <= 0) {
    issues.push('network.downloadTimeoutMs must be positive');
  }
  if (config.network.politenessDelayMs < 0) {
    issues.push('network.politenessDelayMs must not be negative');
  }
  if (!Number.isInteger(config.network.maxRetries) || config.network.maxRetries < 0) {
    issues.push('network.maxRetries must be a non-negative integer');
  }
  if (config.repositories.length === 0) {
    issues.push('repositories must list at least one repository');
  }
  for (const repository of config.repositories) {
    if (!isHttpUrl(repository.url)) {
      issues.push(`repository '${repository.name}' has an invalid URL: ${repository.url}`);
    }
  }
  if (config.defaultFolder.trim() === '') {
    issues.push('defaultFolder must not be empty');
  }

  if (issues.length > 0) {
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}
