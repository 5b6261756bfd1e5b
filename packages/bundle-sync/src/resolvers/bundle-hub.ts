/**
 * Bundle Hub Source
 *
 * The bundle hub is a git repository with one directory per bundle holding
 * `<bundle>-<version>.jar` files. Versions are discovered through the host's
 * contents API; files are downloaded from its raw file host.
 */

import { z } from 'zod';
import { MalformedResponseError, NotFoundError } from '../core/errors.js';
import type { HTTPClient } from '../core/http-client.js';
import { SOURCE_NAMES } from '../core/types.js';
import type { ArtifactCoordinate, ResolvedVersion } from '../core/types.js';
import { compareBundleHubVersions, maxVersion } from '../core/version-comparator.js';
import type { VersionSource } from './types.js';

export const BundleHubListingSchema = z.array(
  z.object({
    name: z.string(),
    type: z.string(),
  })
);

export type BundleHubListing = z.infer<typeof BundleHubListingSchema>;

export interface BundleHubOptions {
  readonly apiUrl: string;
  readonly timeoutMs: number;
}

/**
 * Bundle hub lookups key on the artifactId, which is the bundle directory name
 */
export class BundleHubSource implements VersionSource {
  readonly name = SOURCE_NAMES.BUNDLE_HUB;

  constructor(
    private readonly http: HTTPClient,
    private readonly options: BundleHubOptions
  ) {}

  async lookup(coordinate: ArtifactCoordinate): Promise<ResolvedVersion> {
    const bundle = coordinate.artifactId;
    const versions = await this.listVersions(bundle);

    const latest = maxVersion(versions, compareBundleHubVersions);
    if (latest === undefined) {
      throw new NotFoundError(`No ${bundle} JARs on the bundle hub`);
    }
    return { version: latest, sourceName: this.name };
  }

  /**
   * Versions of every `<bundle>-<version>.jar` file in the bundle's directory,
   * in listing order
   */
  async listVersions(bundle: string): Promise<string[]> {
    const url = `${this.options.apiUrl}/${bundle}`;
    const body = await this.http.fetchJSON(url, {
      timeoutMs: this.options.timeoutMs,
      headers: { Accept: 'application/vnd.github.v3+json' },
    });

    const listing = BundleHubListingSchema.safeParse(body);
    if (!listing.success) {
      throw new MalformedResponseError('Unexpected bundle hub listing shape', url);
    }

    return extractVersions(listing.data, bundle);
  }
}

/**
 * Raw download URL of one bundle version
 */
export function bundleHubDownloadUrl(rawUrl: string, bundle: string, version: string): string {
  return `${rawUrl}/${bundle}/${bundle}-${version}.jar`;
}

/**
 * Pull versions out of `<bundle>-<version>.jar` file names
 */
export function extractVersions(listing: BundleHubListing, bundle: string): string[] {
  const prefix = `${bundle}-`;
  return listing
    .filter(
      (item) =>
        item.type === 'file' &&
        item.name.startsWith(prefix) &&
        item.name.endsWith('.jar') &&
        item.name.length > prefix.length + '.jar'.length
    )
    .map((item) => item.name.slice(prefix.length, -'.jar'.length));
}
