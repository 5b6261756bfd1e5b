/**
 * Bundle Sync Core Types
 *
 * Data model shared by the resolver, fetcher, index reader and
 * reconciliation engine. Every record is produced once and never mutated.
 *
 * @module core/types
 */

import type { ErrorCode } from './errors.js';

// ============================================================================
// Identity
// ============================================================================

/**
 * Maven coordinate (group + artifact) in the upstream registry's namespace
 */
export interface ArtifactCoordinate {
  readonly groupId: string;
  readonly artifactId: string;
}

/**
 * Format a coordinate as `group:artifact`
 */
export function formatCoordinate(coordinate: ArtifactCoordinate): string {
  return `${coordinate.groupId}:${coordinate.artifactId}`;
}

// ============================================================================
// Desired State
// ============================================================================

/**
 * Well-known source names accepted in the declaration's `source` field
 */
export const SOURCE_NAMES = {
  MAVEN_CENTRAL: 'Maven Central',
  BUNDLE_HUB: 'BND Hub',
  ARTIFACT_BROWSER: 'mvnrepository',
} as const;

export type KnownSourceName = (typeof SOURCE_NAMES)[keyof typeof SOURCE_NAMES];

/**
 * One explicit entry from the declaration's additional-download list
 */
export interface ArtifactRecord {
  readonly coordinate: ArtifactCoordinate;
  /** Version the declaration currently lists (compared in check-only mode) */
  readonly version?: string;
  readonly destinationFolder: string;
  /** Pinned version; skips network resolution when set */
  readonly pinnedVersion?: string;
  readonly preferredSource?: string;
  /** Custom repository base URL; tried alone, without the fallback list */
  readonly customRepositoryUrl?: string;
  readonly comment?: string;
}

/**
 * Mapping-table value for a bundle identity found in the index
 */
export type BundleMapping =
  | { readonly kind: 'maven'; readonly coordinate: ArtifactCoordinate }
  | { readonly kind: 'local' };

/**
 * Parsed desired-state declaration
 */
export interface DesiredState {
  readonly bundles: ReadonlyMap<string, BundleMapping>;
  readonly artifacts: readonly ArtifactRecord[];
  /** Declared entries dropped as incomplete or unusable; placeholders excluded */
  readonly skipped: number;
}

// ============================================================================
// Repository Index
// ============================================================================

/**
 * One resource row from the repository index
 */
export interface BundleEntry {
  readonly identity: string;
  readonly version: string;
  /** Repository-relative download location, e.g. `folder/name-1.0.jar` */
  readonly contentUrl: string;
  readonly type?: string;
}

// ============================================================================
// Resolution
// ============================================================================

/**
 * Named repository base URL
 */
export interface RepositoryDescriptor {
  readonly name: string;
  readonly url: string;
}

/**
 * Latest version found upstream, plus where it was found
 */
export interface ResolvedVersion {
  readonly version: string;
  readonly sourceName: string;
  /** Hosting repositories inferred by the artifact browser fallback */
  readonly candidateRepositories?: readonly RepositoryDescriptor[];
}

// ============================================================================
// Outcomes
// ============================================================================

export type OutcomeOrigin = 'index' | 'declared';

export type OutcomeKind =
  | 'updated'
  | 'up-to-date'
  | 'unavailable'
  | 'local-only'
  | 'not-mapped'
  | 'error';

export const OUTCOME_KINDS: readonly OutcomeKind[] = [
  'updated',
  'up-to-date',
  'unavailable',
  'local-only',
  'not-mapped',
  'error',
];

interface OutcomeBase {
  readonly origin: OutcomeOrigin;
  /** Bundle identity for index entries, `group:artifact` for declared ones */
  readonly subject: string;
}

export interface UpdatedOutcome extends OutcomeBase {
  readonly kind: 'updated';
  readonly coordinate: ArtifactCoordinate;
  /** Absent for declared artifacts that had no local copy */
  readonly previousVersion?: string;
  readonly version: string;
  readonly folder: string;
  readonly path: string;
  readonly source: string;
}

export interface UpToDateOutcome extends OutcomeBase {
  readonly kind: 'up-to-date';
  readonly coordinate: ArtifactCoordinate;
  readonly version: string;
  readonly latestVersion: string;
}

export interface UnavailableOutcome extends OutcomeBase {
  readonly kind: 'unavailable';
  readonly coordinate: ArtifactCoordinate;
  readonly localVersion: string;
  readonly location: string;
}

export interface LocalOnlyOutcome extends OutcomeBase {
  readonly kind: 'local-only';
  readonly reason: 'marked-local' | 'already-exists';
  readonly coordinate?: ArtifactCoordinate;
  readonly localVersion?: string;
  readonly location: string;
}

export interface NotMappedOutcome extends OutcomeBase {
  readonly kind: 'not-mapped';
  readonly localVersion: string;
  readonly location: string;
}

export interface ErrorOutcome extends OutcomeBase {
  readonly kind: 'error';
  readonly coordinate?: ArtifactCoordinate;
  readonly reason: string;
  readonly code: ErrorCode;
}

export type OutcomeRecord =
  | UpdatedOutcome
  | UpToDateOutcome
  | UnavailableOutcome
  | LocalOnlyOutcome
  | NotMappedOutcome
  | ErrorOutcome;

/**
 * Narrow an outcome list to a single kind
 */
export function outcomesOfKind<K extends OutcomeKind>(
  outcomes: readonly OutcomeRecord[],
  kind: K
): Extract<OutcomeRecord, { kind: K }>[] {
  return outcomes.filter(
    (outcome): outcome is Extract<OutcomeRecord, { kind: K }> => outcome.kind === kind
  );
}

/**
 * Complete result of one reconciliation run
 */
export interface ReconciliationResult {
  readonly outcomes: readonly OutcomeRecord[];
  readonly counts: Readonly<Record<OutcomeKind, number>>;
  /** Absolute paths of every JAR written during the run */
  readonly writtenFiles: readonly string[];
  /** False when the index document was absent and only declared artifacts ran */
  readonly indexProcessed: boolean;
}

// ============================================================================
// Check-only Mode
// ============================================================================

export type UpdateCheck =
  | {
      readonly status: 'update-available';
      readonly coordinate: ArtifactCoordinate;
      readonly currentVersion: string | 'unpinned';
      readonly latestVersion: string;
      readonly folder: string;
      readonly comment?: string;
    }
  | {
      readonly status: 'current';
      readonly coordinate: ArtifactCoordinate;
      readonly currentVersion: string;
      readonly latestVersion: string;
    }
  | {
      readonly status: 'not-found';
      readonly coordinate: ArtifactCoordinate;
      readonly currentVersion?: string;
      readonly reason: string;
    };
