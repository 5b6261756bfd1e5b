/**
 * Repository Index Reader
 *
 * Parses an OSGi repository index (`index.xml`, optionally gzipped) into
 * BundleEntry triples. Only two capability namespaces matter:
 *
 * - `osgi.identity` supplies identity, version and type
 * - `osgi.content` supplies the download url
 *
 * Resources that lack an identity or a version are dropped without a
 * warning; bnd writes such resources for non-bundle content.
 *
 * @module index-reader
 */

import { readFile } from 'node:fs/promises';
import { gunzipSync } from 'node:zlib';
import { parseStringPromise, processors } from 'xml2js';
import { z } from 'zod';
import { IndexFormatError, errorMessage, isMissingFileError } from '../core/errors.js';
import type { BundleEntry } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';

export const REPOSITORY_NAMESPACE = 'http://www.osgi.org/xmlns/repository/v1.0.0';

const IDENTITY_NAMESPACE = 'osgi.identity';
const CONTENT_NAMESPACE = 'osgi.content';

const log = createLogger({ module: 'index-reader' });

// ============================================================================
// Parsed Document Shape (xml2js, explicitArray, attributes under `$`)
// ============================================================================

const AttributeSchema = z.object({
  $: z.object({
    name: z.string(),
    value: z.string().optional(),
  }),
});

const CapabilitySchema = z.object({
  $: z.object({ namespace: z.string() }),
  attribute: z.array(z.unknown()).optional(),
});

const ResourceSchema = z.object({
  capability: z.array(z.unknown()).optional(),
});

const RootSchema = z.object({
  $: z.record(z.string()).optional(),
  resource: z.array(z.unknown()).optional(),
});

type Capability = z.infer<typeof CapabilitySchema>;

// ============================================================================
// Parsing
// ============================================================================

/**
 * Parse index XML into bundle entries
 *
 * @param xml - Index document
 * @param source - Label used in error messages (usually the file path)
 * @throws {IndexFormatError} If the document is not well-formed XML
 */
export async function parseRepositoryIndex(
  xml: string,
  source = '<inline>'
): Promise<BundleEntry[]> {
  let parsed: unknown;
  try {
    parsed = await parseStringPromise(xml, {
      tagNameProcessors: [processors.stripPrefix],
    });
  } catch (error) {
    throw new IndexFormatError(
      `Repository index is not well-formed XML: ${errorMessage(error)}`,
      source,
      { cause: error }
    );
  }

  if (parsed === null || typeof parsed !== 'object') {
    return [];
  }

  const [rootElement] = Object.values(parsed);
  const root = RootSchema.safeParse(rootElement);
  if (!root.success || !declaresRepositoryNamespace(root.data.$)) {
    log.debug('Index root does not declare the repository namespace', { source });
    return [];
  }

  const entries: BundleEntry[] = [];
  for (const rawResource of root.data.resource ?? []) {
    const entry = readResource(rawResource);
    if (entry) {
      entries.push(entry);
    }
  }
  return entries;
}

/**
 * Read and parse an index file
 *
 * Files ending in `.gz` are gunzipped first.
 *
 * @returns Entries, or null when the file does not exist
 * @throws {IndexFormatError} If the file exists but cannot be parsed
 */
export async function readRepositoryIndex(path: string): Promise<BundleEntry[] | null> {
  let raw: Buffer;
  try {
    raw = await readFile(path);
  } catch (error) {
    if (isMissingFileError(error)) {
      return null;
    }
    throw new IndexFormatError(`Cannot read repository index: ${errorMessage(error)}`, path, {
      cause: error,
    });
  }

  let xml: string;
  try {
    xml = path.endsWith('.gz') ? gunzipSync(raw).toString('utf-8') : raw.toString('utf-8');
  } catch (error) {
    throw new IndexFormatError(`Cannot decompress repository index: ${errorMessage(error)}`, path, {
      cause: error,
    });
  }

  const entries = await parseRepositoryIndex(xml, path);
  log.info('Repository index loaded', { path, entries: entries.length });
  return entries;
}

// ============================================================================
// Helpers
// ============================================================================

function declaresRepositoryNamespace(attributes: Record<string, string> | undefined): boolean {
  if (!attributes) {
    return false;
  }
  return Object.entries(attributes).some(
    ([name, value]) =>
      (name === 'xmlns' || name.startsWith('xmlns:')) && value === REPOSITORY_NAMESPACE
  );
}

function readResource(rawResource: unknown): BundleEntry | null {
  const resource = ResourceSchema.safeParse(rawResource);
  if (!resource.success) {
    return null;
  }

  let identity: string | undefined;
  let version: string | undefined;
  let type: string | undefined;
  let contentUrl = '';

  for (const rawCapability of resource.data.capability ?? []) {
    const capability = CapabilitySchema.safeParse(rawCapability);
    if (!capability.success) {
      continue;
    }

    const attributes = readAttributes(capability.data);
    const namespace = capability.data.$.namespace;

    if (namespace === IDENTITY_NAMESPACE) {
      identity = attributes.get(IDENTITY_NAMESPACE);
      version = attributes.get('version');
      type = attributes.get('type');
    } else if (namespace === CONTENT_NAMESPACE) {
      contentUrl = attributes.get('url') ?? contentUrl;
    }
  }

  if (!identity || !version) {
    return null;
  }

  return type === undefined
    ? { identity, version, contentUrl }
    : { identity, version, contentUrl, type };
}

function readAttributes(capability: Capability): Map<string, string> {
  const attributes = new Map<string, string>();
  for (const rawAttribute of capability.attribute ?? []) {
    const attribute = AttributeSchema.safeParse(rawAttribute);
    if (attribute.success && attribute.data.$.value !== undefined) {
      attributes.set(attribute.data.$.name, attribute.data.$.value);
    }
  }
  return attributes;
}
