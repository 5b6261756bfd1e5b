/**
 * Pipeline Wiring
 *
 * Builds the HTTP client, version sources, fetcher and engine from one
 * SyncConfig. Commands and tests call this instead of wiring by hand.
 */

import type { SyncConfig } from '../core/config.js';
import { HTTPClient } from '../core/http-client.js';
import type { Logger } from '../core/utils/logger.js';
import { ArtifactFetcher } from '../fetch/artifact-fetcher.js';
import { HostRateLimiter } from '../resilience/rate-limiter.js';
import { ArtifactBrowserSource } from '../resolvers/artifact-browser.js';
import { BundleHubSource } from '../resolvers/bundle-hub.js';
import { CentralSearchSource } from '../resolvers/central-search.js';
import { SourceResolver } from '../resolvers/source-resolver.js';
import { ReconciliationEngine } from './reconciliation-engine.js';

export interface SyncPipeline {
  readonly config: SyncConfig;
  readonly http: HTTPClient;
  readonly rateLimiter: HostRateLimiter;
  readonly resolver: SourceResolver;
  readonly fetcher: ArtifactFetcher;
  readonly engine: ReconciliationEngine;
}

export interface PipelineOptions {
  readonly logger?: Logger;
}

export function createSyncPipeline(config: SyncConfig, options: PipelineOptions = {}): SyncPipeline {
  const { upstream, network } = config;

  const rateLimiter = new HostRateLimiter({ minIntervalMs: network.politenessDelayMs });
  const http = new HTTPClient(
    {
      userAgent: upstream.userAgent,
      timeoutMs: network.metadataTimeoutMs,
      maxRetries: network.maxRetries,
    },
    rateLimiter
  );

  const resolver = new SourceResolver({
    chain: [
      new CentralSearchSource(http, {
        searchUrl: upstream.searchUrl,
        timeoutMs: network.metadataTimeoutMs,
      }),
      new ArtifactBrowserSource(http, {
        browserUrl: upstream.browserUrl,
        userAgent: upstream.browserUserAgent,
        timeoutMs: network.metadataTimeoutMs,
      }),
    ],
    preferable: [
      new BundleHubSource(http, {
        apiUrl: upstream.bundleHubApiUrl,
        timeoutMs: network.metadataTimeoutMs,
      }),
    ],
    logger: options.logger,
  });

  const fetcher = new ArtifactFetcher(http, {
    timeoutMs: network.downloadTimeoutMs,
    errorPageThresholdBytes: config.errorPageThresholdBytes,
    logger: options.logger,
  });

  const engine = new ReconciliationEngine(config, { resolver, fetcher, logger: options.logger });

  return { config, http, rateLimiter, resolver, fetcher, engine };
}
