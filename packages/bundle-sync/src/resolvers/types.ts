/**
 * Version Source Types
 *
 * A version source answers one question: what is the newest published
 * version of this coordinate? Sources throw on failure; the SourceResolver
 * turns every failure into "not found" and moves on to the next source.
 */

import type { ArtifactCoordinate, ResolvedVersion } from '../core/types.js';

export interface VersionSource {
  /** Name matched against a declaration's `source` field */
  readonly name: string;

  /**
   * Look up the latest version
   *
   * @throws {NotFoundError} When the source has no match
   * @throws {TransportError} On network failure, timeout or non-2xx status
   * @throws {MalformedResponseError} When the payload has an unexpected shape
   */
  lookup(coordinate: ArtifactCoordinate): Promise<ResolvedVersion>;
}
