/**
 * Reconciliation Engine
 *
 * Compares what the repository holds (index entries plus explicitly
 * declared artifacts) against what upstream publishes, downloads whatever
 * is stale or missing, and classifies every subject into exactly one
 * outcome:
 *
 *   updated | up-to-date | unavailable | local-only | not-mapped | error
 *
 * INDEX PASS (first matching rule wins):
 * 1. identity absent from the mapping table  -> not-mapped (no network)
 * 2. mapping is `local`                      -> local-only (marked-local)
 * 3. no source knows the coordinate          -> unavailable
 * 4. local >= latest                         -> up-to-date
 * 5. local <  latest                         -> download, then updated | error
 *
 * DECLARED PASS:
 * - sync mode: an artifact already on disk   -> local-only (already-exists)
 * - pin, or resolve latest (preferred source first)
 * - download from the bundle hub, a custom repository alone, or the
 *   default registry followed by the fallback list
 *
 * Per-artifact work runs on a bulkhead; outcomes keep input order.
 * Nothing below the engine throws for a per-artifact failure.
 */

import { readdir, stat } from 'node:fs/promises';
import { join } from 'node:path';
import type { SyncConfig } from '../core/config.js';
import { isMissingFileError, toSyncError } from '../core/errors.js';
import type { ErrorCode } from '../core/errors.js';
import { SOURCE_NAMES, formatCoordinate } from '../core/types.js';
import type {
  ArtifactCoordinate,
  ArtifactRecord,
  BundleEntry,
  BundleMapping,
  DesiredState,
  OutcomeKind,
  OutcomeRecord,
  ReconciliationResult,
  RepositoryDescriptor,
  ResolvedVersion,
  UpdateCheck,
} from '../core/types.js';
import type { Logger } from '../core/utils/logger.js';
import { createLogger } from '../core/utils/logger.js';
import { compareVersions } from '../core/version-comparator.js';
import type { ArtifactFetcher, FallbackFetchResult } from '../fetch/artifact-fetcher.js';
import { jarFileName } from '../fetch/artifact-fetcher.js';
import { Bulkhead } from '../resilience/bulkhead.js';
import { bundleHubDownloadUrl } from '../resolvers/bundle-hub.js';
import type { SourceResolver } from '../resolvers/source-resolver.js';

// ============================================================================
// Types
// ============================================================================

export interface EngineDependencies {
  readonly resolver: SourceResolver;
  readonly fetcher: ArtifactFetcher;
  readonly logger?: Logger;
}

export interface DeclaredPassOptions {
  /** Skip artifacts already present in their destination folder */
  readonly sync: boolean;
}

export interface RunInput {
  /** Index entries, or null when no index file exists */
  readonly index: readonly BundleEntry[] | null;
  readonly desiredState: DesiredState;
  readonly sync?: boolean;
}

type DownloadOutcome =
  | { readonly ok: true; readonly path: string; readonly source: string }
  | { readonly ok: false; readonly code: ErrorCode; readonly reason: string };

// ============================================================================
// Engine
// ============================================================================

export class ReconciliationEngine {
  private readonly config: SyncConfig;
  private readonly resolver: SourceResolver;
  private readonly fetcher: ArtifactFetcher;
  private readonly log: Logger;
  private readonly workers: Bulkhead;

  constructor(config: SyncConfig, deps: EngineDependencies) {
    this.config = config;
    this.resolver = deps.resolver;
    this.fetcher = deps.fetcher;
    this.log = deps.logger ?? createLogger({ module: 'engine' });
    this.workers = new Bulkhead({ name: 'reconcile', maxConcurrent: config.concurrency });
  }

  /**
   * Full run: index pass (when an index exists), then the declared pass
   */
  async run(input: RunInput): Promise<ReconciliationResult> {
    const indexOutcomes =
      input.index === null
        ? []
        : await this.reconcileIndex(input.index, input.desiredState.bundles);

    if (input.index === null) {
      this.log.warn('No repository index; reconciling declared artifacts only');
    }

    const declaredOutcomes = await this.reconcileDeclared(input.desiredState.artifacts, {
      sync: input.sync ?? false,
    });

    return summarize([...indexOutcomes, ...declaredOutcomes], input.index !== null);
  }

  // ==========================================================================
  // Index Pass
  // ==========================================================================

  /**
   * Reconcile the newest entry of every identity in the index
   */
  async reconcileIndex(
    entries: readonly BundleEntry[],
    bundles: ReadonlyMap<string, BundleMapping>
  ): Promise<OutcomeRecord[]> {
    const latest = latestPerIdentity(entries);
    this.log.info('Reconciling index', { entries: entries.length, identities: latest.length });

    return this.workers.map(latest, (entry) =>
      this.guard(entry.identity, 'index', undefined, () =>
        this.reconcileEntry(entry, bundles.get(entry.identity))
      )
    );
  }

  private async reconcileEntry(
    entry: BundleEntry,
    mapping: BundleMapping | undefined
  ): Promise<OutcomeRecord> {
    const subject = entry.identity;

    if (mapping === undefined) {
      return freeze({
        kind: 'not-mapped',
        origin: 'index',
        subject,
        localVersion: entry.version,
        location: entry.contentUrl,
      });
    }

    if (mapping.kind === 'local') {
      return freeze({
        kind: 'local-only',
        origin: 'index',
        subject,
        reason: 'marked-local',
        localVersion: entry.version,
        location: entry.contentUrl,
      });
    }

    const { coordinate } = mapping;
    const resolved = await this.resolver.resolveLatest(coordinate);

    if (resolved === null) {
      return freeze({
        kind: 'unavailable',
        origin: 'index',
        subject,
        coordinate,
        localVersion: entry.version,
        location: entry.contentUrl,
      });
    }

    if (compareVersions(entry.version, resolved.version) >= 0) {
      return freeze({
        kind: 'up-to-date',
        origin: 'index',
        subject,
        coordinate,
        version: entry.version,
        latestVersion: resolved.version,
      });
    }

    const folder = folderOf(entry.contentUrl);
    const destinationDir = join(this.config.paths.repository, folder);
    this.log.info('Update available', {
      identity: subject,
      local: entry.version,
      latest: resolved.version,
    });

    const download = fromFallback(
      await this.fetcher.fetchWithFallback(
        coordinate,
        resolved.version,
        destinationDir,
        this.downloadRepositories(resolved)
      ),
      resolved.version
    );

    if (!download.ok) {
      return freeze({
        kind: 'error',
        origin: 'index',
        subject,
        coordinate,
        code: download.code,
        reason: download.reason,
      });
    }

    return freeze({
      kind: 'updated',
      origin: 'index',
      subject,
      coordinate,
      previousVersion: entry.version,
      version: resolved.version,
      folder,
      path: download.path,
      source: download.source,
    });
  }

  // ==========================================================================
  // Declared Pass
  // ==========================================================================

  /**
   * Fetch every explicitly declared artifact
   */
  async reconcileDeclared(
    records: readonly ArtifactRecord[],
    options: DeclaredPassOptions
  ): Promise<OutcomeRecord[]> {
    this.log.info('Reconciling declared artifacts', {
      artifacts: records.length,
      sync: options.sync,
    });

    return this.workers.map(records, (record) =>
      this.guard(formatCoordinate(record.coordinate), 'declared', record.coordinate, () =>
        this.reconcileRecord(record, options)
      )
    );
  }

  private async reconcileRecord(
    record: ArtifactRecord,
    options: DeclaredPassOptions
  ): Promise<OutcomeRecord> {
    const { coordinate } = record;
    const subject = formatCoordinate(coordinate);
    const folder = record.destinationFolder;
    const destinationDir = join(this.config.paths.repository, folder);

    if (options.sync) {
      const existing = await findExistingJar(
        destinationDir,
        coordinate.artifactId,
        record.pinnedVersion
      );
      if (existing) {
        this.log.debug('Already present', { subject, file: existing.fileName });
        return freeze({
          kind: 'local-only',
          origin: 'declared',
          subject,
          reason: 'already-exists',
          coordinate,
          localVersion: existing.version,
          location: `${folder}/${existing.fileName}`,
        });
      }
    }

    const resolved: ResolvedVersion | null = record.pinnedVersion
      ? {
          version: record.pinnedVersion,
          sourceName: record.preferredSource ?? SOURCE_NAMES.MAVEN_CENTRAL,
        }
      : await this.resolver.resolveLatest(coordinate, record.preferredSource);

    if (resolved === null) {
      return freeze({
        kind: 'error',
        origin: 'declared',
        subject,
        coordinate,
        code: 'NOT_FOUND',
        reason: 'Not found on any source',
      });
    }

    const download = await this.downloadDeclared(record, resolved, destinationDir);

    if (!download.ok) {
      return freeze({
        kind: 'error',
        origin: 'declared',
        subject,
        coordinate,
        code: download.code,
        reason: download.reason,
      });
    }

    return freeze({
      kind: 'updated',
      origin: 'declared',
      subject,
      coordinate,
      version: resolved.version,
      folder,
      path: download.path,
      source: download.source,
    });
  }

  private async downloadDeclared(
    record: ArtifactRecord,
    resolved: ResolvedVersion,
    destinationDir: string
  ): Promise<DownloadOutcome> {
    const { coordinate } = record;
    const { version } = resolved;

    if (resolved.sourceName === SOURCE_NAMES.BUNDLE_HUB) {
      const url = bundleHubDownloadUrl(
        this.config.upstream.bundleHubRawUrl,
        coordinate.artifactId,
        version
      );
      const result = await this.fetcher.fetchUrl(
        url,
        join(destinationDir, jarFileName(coordinate.artifactId, version))
      );
      return result.ok
        ? { ok: true, path: result.path, source: SOURCE_NAMES.BUNDLE_HUB }
        : {
            ok: false,
            code: result.error.code,
            reason: `Failed to download ${version} from the bundle hub: ${result.error.message}`,
          };
    }

    if (record.customRepositoryUrl) {
      const result = await this.fetcher.fetch(
        coordinate,
        version,
        destinationDir,
        record.customRepositoryUrl
      );
      return result.ok
        ? { ok: true, path: result.path, source: record.customRepositoryUrl }
        : {
            ok: false,
            code: result.error.code,
            reason: `Failed to download ${version} from ${record.customRepositoryUrl}: ${result.error.message}`,
          };
    }

    return fromFallback(
      await this.fetcher.fetchWithFallback(
        coordinate,
        version,
        destinationDir,
        this.downloadRepositories(resolved)
      ),
      version
    );
  }

  // ==========================================================================
  // Check-only Mode
  // ==========================================================================

  /**
   * Compare each declared artifact with its latest upstream version
   * without downloading anything
   */
  async checkDeclared(records: readonly ArtifactRecord[]): Promise<UpdateCheck[]> {
    return this.workers.map(records, (record) => this.checkRecord(record));
  }

  private async checkRecord(record: ArtifactRecord): Promise<UpdateCheck> {
    const { coordinate } = record;
    const fromHub = record.preferredSource === SOURCE_NAMES.BUNDLE_HUB;

    const resolved = fromHub
      ? await this.resolver.resolveFrom(SOURCE_NAMES.BUNDLE_HUB, coordinate)
      : await this.resolver.resolveLatest(coordinate);

    if (resolved === null) {
      return freeze({
        status: 'not-found',
        coordinate,
        currentVersion: record.version,
        reason: fromHub ? 'Not found on the bundle hub' : 'Not found',
      });
    }

    if (record.version === undefined) {
      return freeze({
        status: 'update-available',
        coordinate,
        currentVersion: 'unpinned',
        latestVersion: resolved.version,
        folder: record.destinationFolder,
        comment: record.comment,
      });
    }

    if (compareVersions(record.version, resolved.version) < 0) {
      return freeze({
        status: 'update-available',
        coordinate,
        currentVersion: record.version,
        latestVersion: resolved.version,
        folder: record.destinationFolder,
        comment: record.comment,
      });
    }

    return freeze({
      status: 'current',
      coordinate,
      currentVersion: record.version,
      latestVersion: resolved.version,
    });
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  /**
   * Default registry, then repositories the artifact browser saw, then the
   * configured fallback list (duplicates are dropped by the fetcher)
   */
  private downloadRepositories(resolved: ResolvedVersion): RepositoryDescriptor[] {
    return [
      { name: SOURCE_NAMES.MAVEN_CENTRAL, url: this.config.upstream.centralRepositoryUrl },
      ...(resolved.candidateRepositories ?? []),
      ...this.config.repositories,
    ];
  }

  /**
   * Turn anything a unit of work throws into an error outcome
   */
  private async guard(
    subject: string,
    origin: 'index' | 'declared',
    coordinate: ArtifactCoordinate | undefined,
    work: () => Promise<OutcomeRecord>
  ): Promise<OutcomeRecord> {
    try {
      return await work();
    } catch (error) {
      const syncError = toSyncError(error);
      this.log.error('Reconciliation failed', {
        subject,
        code: syncError.code,
        error: syncError.message,
      });
      return freeze({
        kind: 'error',
        origin,
        subject,
        coordinate,
        code: syncError.code,
        reason: syncError.message,
      });
    }
  }
}

// ============================================================================
// Pure Helpers
// ============================================================================

/**
 * Keep the highest version per identity, sorted by identity
 *
 * Comparator ties go to the lexicographically higher raw string, so the
 * choice never depends on index order.
 */
export function latestPerIdentity(entries: readonly BundleEntry[]): BundleEntry[] {
  const best = new Map<string, BundleEntry>();

  for (const entry of entries) {
    const current = best.get(entry.identity);
    if (current === undefined) {
      best.set(entry.identity, entry);
      continue;
    }
    const order = compareVersions(entry.version, current.version);
    if (order > 0 || (order === 0 && entry.version > current.version)) {
      best.set(entry.identity, entry);
    }
  }

  return [...best.values()].sort((a, b) =>
    a.identity < b.identity ? -1 : a.identity > b.identity ? 1 : 0
  );
}

/**
 * First path segment of an index content URL (`folder/name.jar` -> `folder`);
 * empty for a bare file name
 */
export function folderOf(contentUrl: string): string {
  const slash = contentUrl.indexOf('/');
  return slash === -1 ? '' : contentUrl.slice(0, slash);
}

/**
 * Tally outcomes per kind and collect written paths
 */
export function summarize(
  outcomes: readonly OutcomeRecord[],
  indexProcessed: boolean
): ReconciliationResult {
  const counts: Record<OutcomeKind, number> = {
    updated: 0,
    'up-to-date': 0,
    unavailable: 0,
    'local-only': 0,
    'not-mapped': 0,
    error: 0,
  };
  const writtenFiles: string[] = [];

  for (const outcome of outcomes) {
    counts[outcome.kind]++;
    if (outcome.kind === 'updated') {
      writtenFiles.push(outcome.path);
    }
  }

  return Object.freeze({
    outcomes: Object.freeze([...outcomes]),
    counts: Object.freeze(counts),
    writtenFiles: Object.freeze(writtenFiles),
    indexProcessed,
  });
}

interface ExistingJar {
  readonly fileName: string;
  readonly version: string;
}

/**
 * Look for an artifact already in its destination folder
 *
 * With a pin only the exact file counts. Without one, any
 * `<artifactId>-<digit>...jar` does; the highest version is reported.
 */
export async function findExistingJar(
  directory: string,
  artifactId: string,
  pinnedVersion: string | undefined
): Promise<ExistingJar | null> {
  if (pinnedVersion !== undefined) {
    const fileName = jarFileName(artifactId, pinnedVersion);
    try {
      const info = await stat(join(directory, fileName));
      return info.isFile() ? { fileName, version: pinnedVersion } : null;
    } catch (error) {
      if (isMissingFileError(error)) {
        return null;
      }
      throw error;
    }
  }

  let names: string[];
  try {
    names = await readdir(directory);
  } catch (error) {
    if (isMissingFileError(error)) {
      return null;
    }
    throw error;
  }

  const prefix = `${artifactId}-`;
  let found: ExistingJar | null = null;
  for (const name of names) {
    if (!name.startsWith(prefix) || !name.endsWith('.jar')) {
      continue;
    }
    const version = name.slice(prefix.length, -'.jar'.length);
    if (!/^\d/.test(version)) {
      continue;
    }
    if (found === null || compareVersions(version, found.version) > 0) {
      found = { fileName: name, version };
    }
  }
  return found;
}

function fromFallback(result: FallbackFetchResult, version: string): DownloadOutcome {
  if (result.ok) {
    return { ok: true, path: result.path, source: result.source };
  }
  const last = result.attempts[result.attempts.length - 1];
  return {
    ok: false,
    code: last?.error.code ?? 'NOT_FOUND',
    reason: `Failed to download ${version} from any repository`,
  };
}

function freeze<T extends OutcomeRecord | UpdateCheck>(record: T): T {
  Object.freeze(record);
  return record;
}
