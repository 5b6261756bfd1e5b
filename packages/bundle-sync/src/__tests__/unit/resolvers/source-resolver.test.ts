/**
 * Source Resolver Tests
 *
 * Uses in-memory VersionSource fakes; no HTTP involved.
 */

import { describe, it, expect, vi } from 'vitest';
import { NotFoundError, TransportError } from '../../../core/errors.js';
import type { ArtifactCoordinate, ResolvedVersion } from '../../../core/types.js';
import { SourceResolver } from '../../../resolvers/source-resolver.js';
import type { VersionSource } from '../../../resolvers/types.js';
import { RecordingLogger } from '../../utils/index.js';

const CORE: ArtifactCoordinate = { groupId: 'org.example', artifactId: 'core' };

function fakeSource(name: string, answer: string | Error) {
  const lookup = vi.fn(async (_coordinate: ArtifactCoordinate): Promise<ResolvedVersion> => {
    if (answer instanceof Error) {
      throw answer;
    }
    return { version: answer, sourceName: name };
  });
  const source: VersionSource = { name, lookup };
  return { source, lookup };
}

describe('SourceResolver', () => {
  it('should return the first successful answer in chain order', async () => {
    const central = fakeSource('Maven Central', '2.0');
    const browser = fakeSource('mvnrepository', '1.9');
    const resolver = new SourceResolver({
      chain: [central.source, browser.source],
      logger: new RecordingLogger(),
    });

    await expect(resolver.resolveLatest(CORE)).resolves.toEqual({
      version: '2.0',
      sourceName: 'Maven Central',
    });
    expect(browser.lookup).not.toHaveBeenCalled();
  });

  it('should fall through failing sources', async () => {
    const central = fakeSource('Maven Central', new NotFoundError('no match'));
    const browser = fakeSource('mvnrepository', '1.9');
    const resolver = new SourceResolver({
      chain: [central.source, browser.source],
      logger: new RecordingLogger(),
    });

    await expect(resolver.resolveLatest(CORE)).resolves.toEqual({
      version: '1.9',
      sourceName: 'mvnrepository',
    });
  });

  it('should try a preferred source first and not repeat it', async () => {
    const central = fakeSource('Maven Central', new TransportError('HTTP 503', 'https://x'));
    const browser = fakeSource('mvnrepository', new NotFoundError('no release'));
    const hub = fakeSource('BND Hub', new NotFoundError('no jar'));
    const resolver = new SourceResolver({
      chain: [central.source, browser.source],
      preferable: [hub.source],
      logger: new RecordingLogger(),
    });

    expect(resolver.sourcesFor('mvnrepository').map((source) => source.name)).toEqual([
      'mvnrepository',
      'Maven Central',
    ]);
    expect(resolver.sourcesFor('BND Hub').map((source) => source.name)).toEqual([
      'BND Hub',
      'Maven Central',
      'mvnrepository',
    ]);

    await resolver.resolveLatest(CORE, 'mvnrepository');
    expect(browser.lookup).toHaveBeenCalledTimes(1);
    expect(central.lookup).toHaveBeenCalledTimes(1);
  });

  it('should ignore an unknown preferred source name', () => {
    const central = fakeSource('Maven Central', '1.0');
    const resolver = new SourceResolver({ chain: [central.source], logger: new RecordingLogger() });

    expect(resolver.sourcesFor('Somewhere Else').map((source) => source.name)).toEqual([
      'Maven Central',
    ]);
  });

  it('should return null and warn when every source fails', async () => {
    const logger = new RecordingLogger();
    const resolver = new SourceResolver({
      chain: [fakeSource('Maven Central', new Error('socket hang up')).source],
      logger,
    });

    await expect(resolver.resolveLatest(CORE)).resolves.toBeNull();
    expect(logger.messages('warn')).toEqual(['No source knows coordinate']);
  });

  it('should ask only the named source in resolveFrom', async () => {
    const central = fakeSource('Maven Central', '3.0');
    const hub = fakeSource('BND Hub', new NotFoundError('no jar'));
    const resolver = new SourceResolver({
      chain: [central.source],
      preferable: [hub.source],
      logger: new RecordingLogger(),
    });

    await expect(resolver.resolveFrom('BND Hub', CORE)).resolves.toBeNull();
    expect(central.lookup).not.toHaveBeenCalled();
    await expect(resolver.resolveFrom('Nowhere', CORE)).resolves.toBeNull();
  });
});
