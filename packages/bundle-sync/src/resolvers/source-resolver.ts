/**
 * Source Resolver
 *
 * Resolves the latest published version of a coordinate across several
 * upstream sources in priority order:
 *
 * 1. The record's preferred source, when it names a source with a lookup API
 * 2. Central search (primary path)
 * 3. Artifact browser scrape (fallback path)
 *
 * Every source failure (transport, malformed payload, zero matches) is
 * logged and treated as "not found here". A null result means no source
 * knew the coordinate; callers report it and continue.
 */

import { errorMessage, toSyncError } from '../core/errors.js';
import { formatCoordinate } from '../core/types.js';
import type { ArtifactCoordinate, ResolvedVersion } from '../core/types.js';
import type { Logger } from '../core/utils/logger.js';
import { createLogger } from '../core/utils/logger.js';
import type { VersionSource } from './types.js';

export interface SourceResolverOptions {
  /** Sources tried for every coordinate, in order */
  readonly chain: readonly VersionSource[];
  /** Sources only tried when a record names them as preferred */
  readonly preferable?: readonly VersionSource[];
  readonly logger?: Logger;
}

export class SourceResolver {
  private readonly chain: readonly VersionSource[];
  private readonly byName: ReadonlyMap<string, VersionSource>;
  private readonly log: Logger;

  constructor(options: SourceResolverOptions) {
    this.chain = options.chain;
    this.byName = new Map(
      [...options.chain, ...(options.preferable ?? [])].map((source) => [source.name, source])
    );
    this.log = options.logger ?? createLogger({ module: 'resolver' });
  }

  /**
   * Resolve the latest version, trying the preferred source first
   *
   * @returns The first successful answer, or null when no source has one
   */
  async resolveLatest(
    coordinate: ArtifactCoordinate,
    preferredSource?: string
  ): Promise<ResolvedVersion | null> {
    for (const source of this.sourcesFor(preferredSource)) {
      const resolved = await this.tryLookup(source, coordinate);
      if (resolved) {
        return resolved;
      }
    }

    this.log.warn('No source knows coordinate', { coordinate: formatCoordinate(coordinate) });
    return null;
  }

  /**
   * Ask exactly one named source, without fallback
   *
   * @returns null when the source is unknown or has no answer
   */
  async resolveFrom(
    sourceName: string,
    coordinate: ArtifactCoordinate
  ): Promise<ResolvedVersion | null> {
    const source = this.byName.get(sourceName);
    if (!source) {
      this.log.warn('Unknown version source', { source: sourceName });
      return null;
    }
    return this.tryLookup(source, coordinate);
  }

  /**
   * Ordered, de-duplicated source list for one lookup
   */
  sourcesFor(preferredSource?: string): VersionSource[] {
    const preferred = preferredSource ? this.byName.get(preferredSource) : undefined;
    const ordered = preferred ? [preferred, ...this.chain] : [...this.chain];
    return ordered.filter((source, index) => ordered.indexOf(source) === index);
  }

  private async tryLookup(
    source: VersionSource,
    coordinate: ArtifactCoordinate
  ): Promise<ResolvedVersion | null> {
    try {
      const resolved = await source.lookup(coordinate);
      this.log.debug('Resolved version', {
        coordinate: formatCoordinate(coordinate),
        source: source.name,
        version: resolved.version,
      });
      return resolved;
    } catch (error) {
      const syncError = toSyncError(error);
      this.log.debug('Source lookup failed', {
        coordinate: formatCoordinate(coordinate),
        source: source.name,
        code: syncError.code,
        error: errorMessage(error),
      });
      return null;
    }
  }
}
