/**
 * Bundle Sync
 *
 * Keeps a local OSGi bundle repository in step with Maven Central and a
 * list of fallback repositories: resolves the latest upstream version of
 * every indexed and declared artifact, downloads what is newer, and
 * rebuilds the repository index.
 *
 * @example
 * ```typescript
 * import {
 *   createSyncConfig,
 *   createSyncPipeline,
 *   loadDesiredState,
 *   readRepositoryIndex,
 * } from 'bundle-sync';
 *
 * const config = createSyncConfig({ root: '/srv/bundles' });
 * const { engine } = createSyncPipeline(config);
 * const result = await engine.run({
 *   index: await readRepositoryIndex(config.paths.index),
 *   desiredState: await loadDesiredState(config.paths.declaration),
 * });
 * console.log(result.counts);
 * ```
 */

// Core
export * from './core/types.js';
export * from './core/errors.js';
export {
  createSyncConfig,
  defaultPaths,
  validateSyncConfig,
  DEFAULT_NETWORK,
  DEFAULT_REPOSITORIES,
  DEFAULT_UPSTREAM,
  MAVEN_CENTRAL,
} from './core/config.js';
export type {
  NetworkConfig,
  PathsConfig,
  SyncConfig,
  SyncConfigOverrides,
  UpstreamConfig,
} from './core/config.js';
export { compareVersions, compareBundleHubVersions, maxVersion } from './core/version-comparator.js';
export { HTTPClient } from './core/http-client.js';
export type { HTTPClientConfig, FetchOptions } from './core/http-client.js';
export { createLogger } from './core/utils/logger.js';
export type { Logger, LogLevel, LogMetadata } from './core/utils/logger.js';

// Index
export { parseRepositoryIndex, readRepositoryIndex } from './index-reader/index-reader.js';
export { regenerateIndex, execFileRunner } from './index-generator/index-generator.js';
export type {
  CommandResult,
  CommandRunner,
  RegenerateResult,
} from './index-generator/index-generator.js';

// Desired state
export { loadDesiredState, parseDesiredState } from './desired-state/declaration.js';

// Resolution
export type { VersionSource } from './resolvers/types.js';
export { CentralSearchSource } from './resolvers/central-search.js';
export { ArtifactBrowserSource } from './resolvers/artifact-browser.js';
export { BundleHubSource, bundleHubDownloadUrl } from './resolvers/bundle-hub.js';
export { SourceResolver } from './resolvers/source-resolver.js';

// Fetch
export { ArtifactFetcher, buildArtifactUrl, jarFileName } from './fetch/artifact-fetcher.js';
export type { FallbackFetchResult, FetchResult } from './fetch/artifact-fetcher.js';

// Reconciliation
export { ReconciliationEngine, summarize } from './reconcile/reconciliation-engine.js';
export type { RunInput } from './reconcile/reconciliation-engine.js';
export { createSyncPipeline } from './reconcile/pipeline.js';
export type { SyncPipeline } from './reconcile/pipeline.js';

// Report
export { renderMarkdownReport, writeMarkdownReport } from './report/markdown-report.js';
