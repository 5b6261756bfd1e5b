/**
 * Central Search Source
 *
 * Primary version lookup against the central registry's solr search API:
 *
 *   GET <searchUrl>?q=g:"<group>" AND a:"<artifact>"&rows=1&wt=json
 *
 * The first document's `latestVersion` is the answer; older index rows only
 * carry `v`, which is used when `latestVersion` is null.
 */

import { z } from 'zod';
import { MalformedResponseError, NotFoundError } from '../core/errors.js';
import type { HTTPClient } from '../core/http-client.js';
import { SOURCE_NAMES, formatCoordinate } from '../core/types.js';
import type { ArtifactCoordinate, ResolvedVersion } from '../core/types.js';
import type { VersionSource } from './types.js';

/**
 * Search response (only the fields read here)
 */
export const CentralSearchResponseSchema = z.object({
  response: z.object({
    numFound: z.number().int().nonnegative(),
    docs: z.array(
      z.object({
        g: z.string().optional(),
        a: z.string().optional(),
        latestVersion: z.string().nullish(),
        v: z.string().nullish(),
      })
    ),
  }),
});

export type CentralSearchResponse = z.infer<typeof CentralSearchResponseSchema>;

export interface CentralSearchOptions {
  readonly searchUrl: string;
  readonly timeoutMs: number;
}

export class CentralSearchSource implements VersionSource {
  readonly name = SOURCE_NAMES.MAVEN_CENTRAL;

  constructor(
    private readonly http: HTTPClient,
    private readonly options: CentralSearchOptions
  ) {}

  /**
   * Build the search URL for a coordinate
   */
  buildSearchUrl(coordinate: ArtifactCoordinate): string {
    const params = new URLSearchParams({
      q: `g:"${coordinate.groupId}" AND a:"${coordinate.artifactId}"`,
      rows: '1',
      wt: 'json',
    });
    return `${this.options.searchUrl}?${params.toString()}`;
  }

  async lookup(coordinate: ArtifactCoordinate): Promise<ResolvedVersion> {
    const url = this.buildSearchUrl(coordinate);
    const body = await this.http.fetchJSON(url, { timeoutMs: this.options.timeoutMs });

    const parsed = CentralSearchResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new MalformedResponseError(
        `Unexpected search response shape: ${parsed.error.issues[0]?.message ?? 'unknown'}`,
        url
      );
    }

    const [doc] = parsed.data.response.docs;
    if (parsed.data.response.numFound === 0 || doc === undefined) {
      throw new NotFoundError(`${formatCoordinate(coordinate)} not found in central search`);
    }

    const version = doc.latestVersion ?? doc.v;
    if (!version) {
      throw new MalformedResponseError(
        `Search result for ${formatCoordinate(coordinate)} carries no version`,
        url
      );
    }

    return { version, sourceName: this.name };
  }
}
