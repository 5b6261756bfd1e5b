/**
 * Desired-State Declaration Loader
 *
 * Reads `dependencies.json`:
 *
 * ```json
 * {
 *   "bundles": {
 *     "org.example.core": { "groupId": "org.example", "artifactId": "core" },
 *     "org.example.internal": { "local": true }
 *   },
 *   "additionalDownloads": [
 *     { "_comment": "section header" },
 *     { "groupId": "org.example", "artifactId": "extra", "folder": "misc", "version": "1.0" }
 *   ]
 * }
 * ```
 *
 * Comment-only entries are placeholders and are dropped here, so the
 * engine only ever sees complete ArtifactRecords.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigError, errorMessage, isMissingFileError } from '../core/errors.js';
import { SOURCE_NAMES } from '../core/types.js';
import type { ArtifactRecord, BundleMapping, DesiredState } from '../core/types.js';
import type { Logger } from '../core/utils/logger.js';
import { createLogger } from '../core/utils/logger.js';

// ============================================================================
// Schema
// ============================================================================

const BundleMappingSchema = z.object({
  groupId: z.string().min(1).optional(),
  artifactId: z.string().min(1).optional(),
  local: z.boolean().optional(),
});

// Per-entry problems are warnings, not schema failures
const AdditionalDownloadSchema = z.object({
  groupId: z.string().optional(),
  artifactId: z.string().optional(),
  folder: z.string().optional(),
  version: z.string().optional(),
  source: z.string().optional(),
  repoUrl: z.string().optional(),
  _comment: z.string().optional(),
});

const RepositoryUrlSchema = z.string().url();

export const DeclarationSchema = z.object({
  bundles: z.record(BundleMappingSchema).default({}),
  additionalDownloads: z.array(AdditionalDownloadSchema).default([]),
});

export type Declaration = z.infer<typeof DeclarationSchema>;

export interface DeclarationOptions {
  /** Folder used when an entry names none (default: `misc`) */
  readonly defaultFolder?: string;
  readonly logger?: Logger;
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Read and validate a declaration file
 *
 * @throws {ConfigError} If the file is missing, not JSON, or fails validation
 */
export async function loadDesiredState(
  path: string,
  options: DeclarationOptions = {}
): Promise<DesiredState> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    if (isMissingFileError(error)) {
      throw new ConfigError(`Declaration file not found: ${path}`, [path], { cause: error });
    }
    throw new ConfigError(`Cannot read declaration ${path}: ${errorMessage(error)}`, [path], {
      cause: error,
    });
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Declaration ${path} is not valid JSON: ${errorMessage(error)}`, [path], {
      cause: error,
    });
  }

  return parseDesiredState(json, options);
}

/**
 * Validate an already-parsed declaration document
 *
 * @throws {ConfigError} Listing every schema violation
 */
export function parseDesiredState(json: unknown, options: DeclarationOptions = {}): DesiredState {
  const log = options.logger ?? createLogger({ module: 'declaration' });
  const defaultFolder = options.defaultFolder ?? 'misc';

  const parsed = DeclarationSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`
    );
    throw new ConfigError(`Invalid declaration: ${issues.join('; ')}`, issues);
  }

  const bundles = new Map<string, BundleMapping>();
  for (const [identity, mapping] of Object.entries(parsed.data.bundles)) {
    bundles.set(identity, toBundleMapping(mapping));
  }

  const artifacts: ArtifactRecord[] = [];
  let skipped = 0;
  parsed.data.additionalDownloads.forEach((entry, index) => {
    if (entry._comment !== undefined && entry.groupId === undefined) {
      return;
    }
    if (!entry.groupId || !entry.artifactId) {
      log.warn('Skipping incomplete additional download', {
        index,
        groupId: entry.groupId,
        artifactId: entry.artifactId,
      });
      skipped++;
      return;
    }

    const repoUrl = nonEmpty(entry.repoUrl);
    if (repoUrl !== undefined && !RepositoryUrlSchema.safeParse(repoUrl).success) {
      log.warn('Skipping additional download with an unusable repoUrl', {
        index,
        artifact: `${entry.groupId}:${entry.artifactId}`,
        repoUrl,
      });
      skipped++;
      return;
    }

    const version = nonEmpty(entry.version);
    artifacts.push(
      Object.freeze({
        coordinate: Object.freeze({ groupId: entry.groupId, artifactId: entry.artifactId }),
        version,
        pinnedVersion: version,
        destinationFolder: nonEmpty(entry.folder) ?? defaultFolder,
        preferredSource: nonEmpty(entry.source) ?? SOURCE_NAMES.MAVEN_CENTRAL,
        customRepositoryUrl: repoUrl,
        comment: entry._comment,
      })
    );
  });

  log.debug('Declaration loaded', { bundles: bundles.size, artifacts: artifacts.length, skipped });
  return Object.freeze({ bundles, artifacts: Object.freeze(artifacts), skipped });
}

/**
 * An empty string means "not set"
 */
function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

/**
 * `local: true`, or a mapping without both coordinate fields, is local-only
 */
function toBundleMapping(mapping: z.infer<typeof BundleMappingSchema>): BundleMapping {
  if (mapping.local === true || !mapping.groupId || !mapping.artifactId) {
    return { kind: 'local' };
  }
  return {
    kind: 'maven',
    coordinate: { groupId: mapping.groupId, artifactId: mapping.artifactId },
  };
}
