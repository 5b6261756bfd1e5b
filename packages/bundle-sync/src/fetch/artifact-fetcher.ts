/**
 * Artifact Fetcher
 *
 * Downloads JARs from Maven-layout repositories into the bundle repository.
 *
 * GUARANTEES:
 * - Small HTML payloads (error pages served with 200) are rejected, not written
 * - Files are written atomically: complete or absent
 * - Writes to the same destination path never overlap
 * - Failures come back as results; nothing here throws for a failed download
 */

import { join } from 'node:path';
import { FilesystemError, ValidationError, errorMessage, toSyncError } from '../core/errors.js';
import type { SyncError } from '../core/errors.js';
import type { HTTPClient } from '../core/http-client.js';
import { formatCoordinate } from '../core/types.js';
import type { ArtifactCoordinate, RepositoryDescriptor } from '../core/types.js';
import { atomicWriteFile } from '../core/utils/atomic-write.js';
import type { Logger } from '../core/utils/logger.js';
import { createLogger } from '../core/utils/logger.js';
import { KeyedLock } from '../resilience/keyed-lock.js';

// ============================================================================
// Result Types
// ============================================================================

export type FetchResult =
  | {
      readonly ok: true;
      readonly url: string;
      readonly path: string;
      readonly byteLength: number;
    }
  | {
      readonly ok: false;
      readonly url: string;
      readonly error: SyncError;
    };

export interface FetchAttempt {
  readonly repository: RepositoryDescriptor;
  readonly url: string;
  readonly error: SyncError;
}

export type FallbackFetchResult =
  | {
      readonly ok: true;
      readonly source: string;
      readonly url: string;
      readonly path: string;
    }
  | {
      readonly ok: false;
      readonly attempts: readonly FetchAttempt[];
    };

export interface ArtifactFetcherOptions {
  readonly timeoutMs: number;
  /** Payloads smaller than this that contain `<html` are error pages */
  readonly errorPageThresholdBytes: number;
  readonly logger?: Logger;
}

// ============================================================================
// URL Layout
// ============================================================================

/**
 * `<base>/<group path>/<artifact>/<version>/<artifact>-<version>.jar`
 */
export function buildArtifactUrl(
  repositoryBaseUrl: string,
  coordinate: ArtifactCoordinate,
  version: string
): string {
  const base = repositoryBaseUrl.replace(/\/+$/, '');
  const groupPath = coordinate.groupId.replace(/\./g, '/');
  return `${base}/${groupPath}/${coordinate.artifactId}/${version}/${jarFileName(coordinate.artifactId, version)}`;
}

export function jarFileName(artifactId: string, version: string): string {
  return `${artifactId}-${version}.jar`;
}

/**
 * True for a payload that is an HTML error page rather than an archive
 */
export function looksLikeErrorPage(body: Uint8Array, thresholdBytes: number): boolean {
  if (body.byteLength >= thresholdBytes) {
    return false;
  }
  return Buffer.from(body).toString('latin1').toLowerCase().includes('<html');
}

// ============================================================================
// Fetcher
// ============================================================================

export class ArtifactFetcher {
  private readonly locks = new KeyedLock();
  private readonly log: Logger;

  constructor(
    private readonly http: HTTPClient,
    private readonly options: ArtifactFetcherOptions
  ) {
    this.log = options.logger ?? createLogger({ module: 'fetcher' });
  }

  /**
   * Download one version from one repository into `destinationDir`
   */
  async fetch(
    coordinate: ArtifactCoordinate,
    version: string,
    destinationDir: string,
    repositoryBaseUrl: string
  ): Promise<FetchResult> {
    const url = buildArtifactUrl(repositoryBaseUrl, coordinate, version);
    const destinationPath = join(destinationDir, jarFileName(coordinate.artifactId, version));
    return this.fetchUrl(url, destinationPath);
  }

  /**
   * Try each repository in order and stop at the first success
   *
   * Repositories with the same base URL are tried once.
   */
  async fetchWithFallback(
    coordinate: ArtifactCoordinate,
    version: string,
    destinationDir: string,
    repositories: readonly RepositoryDescriptor[]
  ): Promise<FallbackFetchResult> {
    const attempts: FetchAttempt[] = [];

    for (const repository of dedupeRepositories(repositories)) {
      const result = await this.fetch(coordinate, version, destinationDir, repository.url);
      if (result.ok) {
        return { ok: true, source: repository.name, url: result.url, path: result.path };
      }

      attempts.push({ repository, url: result.url, error: result.error });
      this.log.debug('Repository attempt failed', {
        coordinate: formatCoordinate(coordinate),
        version,
        repository: repository.name,
        code: result.error.code,
        error: result.error.message,
      });
    }

    return { ok: false, attempts };
  }

  /**
   * Download an exact URL to an exact path
   */
  async fetchUrl(url: string, destinationPath: string): Promise<FetchResult> {
    let body: Buffer;
    try {
      body = await this.http.fetchBytes(url, { timeoutMs: this.options.timeoutMs });
    } catch (error) {
      return { ok: false, url, error: toSyncError(error, url) };
    }

    if (looksLikeErrorPage(body, this.options.errorPageThresholdBytes)) {
      return {
        ok: false,
        url,
        error: new ValidationError(
          `Received an HTML page instead of a JAR (${body.byteLength} bytes)`,
          url,
          body.byteLength
        ),
      };
    }

    try {
      await this.locks.run(destinationPath, () => atomicWriteFile(destinationPath, body));
    } catch (error) {
      return {
        ok: false,
        url,
        error: new FilesystemError(
          `Cannot write ${destinationPath}: ${errorMessage(error)}`,
          destinationPath,
          { cause: error }
        ),
      };
    }

    this.log.info('Downloaded artifact', { url, path: destinationPath, bytes: body.byteLength });
    return { ok: true, url, path: destinationPath, byteLength: body.byteLength };
  }
}

/**
 * Drop repositories whose base URL was already listed (first one wins)
 */
export function dedupeRepositories(
  repositories: readonly RepositoryDescriptor[]
): RepositoryDescriptor[] {
  const seen = new Set<string>();
  return repositories.filter((repository) => {
    const key = repository.url.replace(/\/+$/, '');
    if (seen.has(key)) {
      return false;
    }
    seen.add(key);
    return true;
  });
}
