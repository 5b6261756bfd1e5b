/**
 * Reconciliation Engine Tests
 *
 * Runs the wired pipeline against a stubbed fetch and a temp repository root.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdir, readdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { createSyncConfig } from '../../../core/config.js';
import type { SyncConfig } from '../../../core/config.js';
import { HTTPClient } from '../../../core/http-client.js';
import type {
  ArtifactCoordinate,
  ArtifactRecord,
  BundleEntry,
  BundleMapping,
  DesiredState,
} from '../../../core/types.js';
import { createSyncPipeline } from '../../../reconcile/pipeline.js';
import {
  findExistingJar,
  folderOf,
  latestPerIdentity,
  summarize,
} from '../../../reconcile/reconciliation-engine.js';
import type { ReconciliationEngine } from '../../../reconcile/reconciliation-engine.js';
import { CentralSearchSource } from '../../../resolvers/central-search.js';
import {
  RecordingLogger,
  createTempDir,
  jarBytes,
  jarResponse,
  jsonResponse,
  removeTempDir,
  requestedUrls,
  searchHit,
  searchMiss,
  stubFetch,
} from '../../utils/index.js';
import type { FetchRoute } from '../../utils/index.js';

const SEARCH = 'https://search.example.org/select';
const CENTRAL = 'https://central.example.org/maven2';
const MIRROR = 'https://mirror.example.org/releases';
const BROWSER = 'https://browser.example.org/artifact';
const HUB_API = 'https://hub.example.org/contents';
const HUB_RAW = 'https://raw.example.org/hub';
const CUSTOM = 'https://custom.example.org/repo';

const ALPHA: ArtifactCoordinate = { groupId: 'org.example', artifactId: 'alpha' };
const TOOL: ArtifactCoordinate = { groupId: 'org.example', artifactId: 'tool' };
const WIDGET: ArtifactCoordinate = { groupId: 'org.example', artifactId: 'widget' };

const searchUrl = (coordinate: ArtifactCoordinate): string =>
  new CentralSearchSource(new HTTPClient(), { searchUrl: SEARCH, timeoutMs: 1000 }).buildSearchUrl(
    coordinate
  );

const jarUrl = (base: string, coordinate: ArtifactCoordinate, version: string): string =>
  `${base}/org/example/${coordinate.artifactId}/${version}/${coordinate.artifactId}-${version}.jar`;

const maven = (coordinate: ArtifactCoordinate): BundleMapping => ({ kind: 'maven', coordinate });

function desired(
  bundles: Record<string, BundleMapping>,
  artifacts: readonly ArtifactRecord[] = []
): DesiredState {
  return { bundles: new Map(Object.entries(bundles)), artifacts, skipped: 0 };
}

function entry(identity: string, version: string, contentUrl: string): BundleEntry {
  return { identity, version, contentUrl };
}

describe('ReconciliationEngine', () => {
  let dir: string;
  let config: SyncConfig;
  let engine: ReconciliationEngine;
  let logger: RecordingLogger;

  function build(concurrency = 1, politenessDelayMs = 0): void {
    config = createSyncConfig({
      root: dir,
      concurrency,
      network: { politenessDelayMs },
      upstream: {
        searchUrl: SEARCH,
        centralRepositoryUrl: CENTRAL,
        browserUrl: BROWSER,
        bundleHubApiUrl: HUB_API,
        bundleHubRawUrl: HUB_RAW,
      },
      repositories: [
        { name: 'Maven Central', url: CENTRAL },
        { name: 'Mirror', url: MIRROR },
      ],
    });
    logger = new RecordingLogger();
    engine = createSyncPipeline(config, { logger }).engine;
  }

  beforeEach(async () => {
    dir = await createTempDir();
    build();
  });

  afterEach(async () => {
    vi.unstubAllGlobals();
    await removeTempDir(dir);
  });

  describe('index pass', () => {
    const alphaRoutes = (): Record<string, FetchRoute> => ({
      [searchUrl(ALPHA)]: () => searchHit('org.example', 'alpha', '1.3.0'),
      [jarUrl(CENTRAL, ALPHA, '1.3.0')]: () => jarResponse('alpha-1.3.0'),
    });

    it('should download a newer upstream version into the entry folder', async () => {
      const fetchMock = stubFetch(alphaRoutes());

      const result = await engine.run({
        index: [entry('org.example.alpha', '1.2.0', 'libs/alpha-1.2.0.jar')],
        desiredState: desired({ 'org.example.alpha': maven(ALPHA) }),
      });

      const path = join(dir, 'dependencies', 'libs', 'alpha-1.3.0.jar');
      expect(result.outcomes).toEqual([
        {
          kind: 'updated',
          origin: 'index',
          subject: 'org.example.alpha',
          coordinate: ALPHA,
          previousVersion: '1.2.0',
          version: '1.3.0',
          folder: 'libs',
          path,
          source: 'Maven Central',
        },
      ]);
      expect(result.counts.updated).toBe(1);
      expect(result.writtenFiles).toEqual([path]);
      expect(result.indexProcessed).toBe(true);
      expect(new Uint8Array(await readFile(path))).toEqual(jarBytes('alpha-1.3.0'));
      expect(requestedUrls(fetchMock)).toEqual([
        searchUrl(ALPHA),
        jarUrl(CENTRAL, ALPHA, '1.3.0'),
      ]);
    });

    it('should fall back to the next repository when the default registry misses', async () => {
      stubFetch({
        [searchUrl(ALPHA)]: () => searchHit('org.example', 'alpha', '1.3.0'),
        [jarUrl(MIRROR, ALPHA, '1.3.0')]: () => jarResponse('mirror'),
      });

      const [outcome] = await engine.reconcileIndex(
        [entry('org.example.alpha', '1.2.0', 'libs/alpha-1.2.0.jar')],
        new Map([['org.example.alpha', maven(ALPHA)]])
      );

      expect(outcome).toMatchObject({ kind: 'updated', source: 'Mirror', version: '1.3.0' });
    });

    it('should report an error when every repository fails', async () => {
      const fetchMock = stubFetch({
        [searchUrl(ALPHA)]: () => searchHit('org.example', 'alpha', '1.3.0'),
      });

      const [outcome] = await engine.reconcileIndex(
        [entry('org.example.alpha', '1.2.0', 'libs/alpha-1.2.0.jar')],
        new Map([['org.example.alpha', maven(ALPHA)]])
      );

      expect(outcome).toEqual({
        kind: 'error',
        origin: 'index',
        subject: 'org.example.alpha',
        coordinate: ALPHA,
        code: 'TRANSPORT',
        reason: 'Failed to download 1.3.0 from any repository',
      });
      expect(requestedUrls(fetchMock)).toEqual([
        searchUrl(ALPHA),
        jarUrl(CENTRAL, ALPHA, '1.3.0'),
        jarUrl(MIRROR, ALPHA, '1.3.0'),
      ]);
      await expect(readdir(join(dir, 'dependencies', 'libs'))).rejects.toThrow();
    });

    it('should classify unmapped identities without any request', async () => {
      const fetchMock = stubFetch();

      const [outcome] = await engine.reconcileIndex(
        [entry('org.example.unknown', '0.9', 'libs/unknown-0.9.jar')],
        new Map()
      );

      expect(outcome).toEqual({
        kind: 'not-mapped',
        origin: 'index',
        subject: 'org.example.unknown',
        localVersion: '0.9',
        location: 'libs/unknown-0.9.jar',
      });
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('should keep identities marked local without any request', async () => {
      const fetchMock = stubFetch();

      const [outcome] = await engine.reconcileIndex(
        [entry('org.example.inhouse', '3.1', 'release/inhouse-3.1.jar')],
        new Map<string, BundleMapping>([['org.example.inhouse', { kind: 'local' }]])
      );

      expect(outcome).toEqual({
        kind: 'local-only',
        origin: 'index',
        subject: 'org.example.inhouse',
        reason: 'marked-local',
        localVersion: '3.1',
        location: 'release/inhouse-3.1.jar',
      });
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('should report unavailable when no source knows the coordinate', async () => {
      const fetchMock = stubFetch({ [searchUrl(ALPHA)]: () => searchMiss() });

      const [outcome] = await engine.reconcileIndex(
        [entry('org.example.alpha', '1.2.0', 'libs/alpha-1.2.0.jar')],
        new Map([['org.example.alpha', maven(ALPHA)]])
      );

      expect(outcome).toEqual({
        kind: 'unavailable',
        origin: 'index',
        subject: 'org.example.alpha',
        coordinate: ALPHA,
        localVersion: '1.2.0',
        location: 'libs/alpha-1.2.0.jar',
      });
      expect(requestedUrls(fetchMock)).toEqual([
        searchUrl(ALPHA),
        `${BROWSER}/org.example/alpha`,
      ]);
    });

    it('should treat a release qualifier as equal and skip the download', async () => {
      const fetchMock = stubFetch(alphaRoutes());

      const [outcome] = await engine.reconcileIndex(
        [entry('org.example.alpha', '1.3.0-RELEASE', 'libs/alpha-1.3.0-RELEASE.jar')],
        new Map([['org.example.alpha', maven(ALPHA)]])
      );

      expect(outcome).toEqual({
        kind: 'up-to-date',
        origin: 'index',
        subject: 'org.example.alpha',
        coordinate: ALPHA,
        version: '1.3.0-RELEASE',
        latestVersion: '1.3.0',
      });
      expect(requestedUrls(fetchMock)).toEqual([searchUrl(ALPHA)]);
    });

    it('should reconcile only the newest entry of each identity', async () => {
      stubFetch(alphaRoutes());

      const outcomes = await engine.reconcileIndex(
        [
          entry('org.example.alpha', '1.3.0', 'libs/alpha-1.3.0.jar'),
          entry('org.example.alpha', '1.1.0', 'libs/alpha-1.1.0.jar'),
        ],
        new Map([['org.example.alpha', maven(ALPHA)]])
      );

      expect(outcomes).toHaveLength(1);
      expect(outcomes[0]).toMatchObject({ kind: 'up-to-date', version: '1.3.0' });
    });

    it('should give every identity exactly one outcome in identity order', async () => {
      build(3);
      stubFetch(alphaRoutes());

      const result = await engine.run({
        index: [
          entry('org.example.zeta', '1.0', 'libs/zeta-1.0.jar'),
          entry('org.example.alpha', '1.2.0', 'libs/alpha-1.2.0.jar'),
          entry('org.example.inhouse', '3.1', 'release/inhouse-3.1.jar'),
          entry('org.example.alpha', '1.0.0', 'libs/alpha-1.0.0.jar'),
        ],
        desiredState: desired({
          'org.example.alpha': maven(ALPHA),
          'org.example.inhouse': { kind: 'local' },
        }),
      });

      expect(result.outcomes.map((outcome) => [outcome.subject, outcome.kind])).toEqual([
        ['org.example.alpha', 'updated'],
        ['org.example.inhouse', 'local-only'],
        ['org.example.zeta', 'not-mapped'],
      ]);
      expect(result.counts).toEqual({
        updated: 1,
        'up-to-date': 0,
        unavailable: 0,
        'local-only': 1,
        'not-mapped': 1,
        error: 0,
      });
    });

    it('should produce the same outcomes and files when run twice', async () => {
      stubFetch(alphaRoutes());
      const input = {
        index: [entry('org.example.alpha', '1.2.0', 'libs/alpha-1.2.0.jar')],
        desiredState: desired({ 'org.example.alpha': maven(ALPHA) }),
      };

      const first = await engine.run(input);
      const second = await engine.run(input);

      expect(second.outcomes).toEqual(first.outcomes);
      expect(await readdir(join(dir, 'dependencies', 'libs'))).toEqual(['alpha-1.3.0.jar']);
    });

    it('should not update again once the index holds the fetched version', async () => {
      const fetchMock = stubFetch(alphaRoutes());
      const bundles = desired({ 'org.example.alpha': maven(ALPHA) });

      await engine.run({
        index: [entry('org.example.alpha', '1.2.0', 'libs/alpha-1.2.0.jar')],
        desiredState: bundles,
      });
      fetchMock.mockClear();
      const second = await engine.run({
        index: [entry('org.example.alpha', '1.3.0', 'libs/alpha-1.3.0.jar')],
        desiredState: bundles,
      });

      expect(second.counts.updated).toBe(0);
      expect(second.counts['up-to-date']).toBe(1);
      expect(requestedUrls(fetchMock)).toEqual([searchUrl(ALPHA)]);
    });

    it('should run only the declared pass without an index', async () => {
      const fetchMock = stubFetch();

      const result = await engine.run({ index: null, desiredState: desired({}) });

      expect(result.indexProcessed).toBe(false);
      expect(result.outcomes).toEqual([]);
      expect(logger.messages('warn')).toEqual([
        'No repository index; reconciling declared artifacts only',
      ]);
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });

  describe('declared pass', () => {
    it('should download a pinned version without resolving it', async () => {
      const fetchMock = stubFetch({
        [jarUrl(CENTRAL, TOOL, '2.0')]: () => jarResponse('tool'),
      });

      const [outcome] = await engine.reconcileDeclared(
        [{ coordinate: TOOL, destinationFolder: 'tools', pinnedVersion: '2.0', version: '2.0' }],
        { sync: false }
      );

      expect(outcome).toEqual({
        kind: 'updated',
        origin: 'declared',
        subject: 'org.example:tool',
        coordinate: TOOL,
        version: '2.0',
        folder: 'tools',
        path: join(dir, 'dependencies', 'tools', 'tool-2.0.jar'),
        source: 'Maven Central',
      });
      expect(requestedUrls(fetchMock)).toEqual([jarUrl(CENTRAL, TOOL, '2.0')]);
    });

    it('should try a custom repository alone', async () => {
      const fetchMock = stubFetch();

      const [outcome] = await engine.reconcileDeclared(
        [
          {
            coordinate: TOOL,
            destinationFolder: 'tools',
            pinnedVersion: '2.0',
            customRepositoryUrl: CUSTOM,
          },
        ],
        { sync: false }
      );

      expect(outcome).toEqual({
        kind: 'error',
        origin: 'declared',
        subject: 'org.example:tool',
        coordinate: TOOL,
        code: 'TRANSPORT',
        reason: `Failed to download 2.0 from ${CUSTOM}: HTTP 404: Not Found`,
      });
      expect(requestedUrls(fetchMock)).toEqual([jarUrl(CUSTOM, TOOL, '2.0')]);
    });

    it('should record the custom repository as the source on success', async () => {
      stubFetch({ [jarUrl(CUSTOM, TOOL, '2.0')]: () => jarResponse('custom') });

      const [outcome] = await engine.reconcileDeclared(
        [
          {
            coordinate: TOOL,
            destinationFolder: 'tools',
            pinnedVersion: '2.0',
            customRepositoryUrl: CUSTOM,
          },
        ],
        { sync: false }
      );

      expect(outcome).toMatchObject({ kind: 'updated', source: CUSTOM });
    });

    it('should resolve and download from the bundle hub when preferred', async () => {
      const fetchMock = stubFetch({
        [`${HUB_API}/widget`]: () =>
          jsonResponse([
            { name: 'widget-4.3.0.jar', type: 'file' },
            { name: 'widget-4.10.1.jar', type: 'file' },
            { name: 'README.md', type: 'file' },
          ]),
        [`${HUB_RAW}/widget/widget-4.10.1.jar`]: () => jarResponse('widget'),
      });

      const [outcome] = await engine.reconcileDeclared(
        [{ coordinate: WIDGET, destinationFolder: 'misc', preferredSource: 'BND Hub' }],
        { sync: false }
      );

      expect(outcome).toEqual({
        kind: 'updated',
        origin: 'declared',
        subject: 'org.example:widget',
        coordinate: WIDGET,
        version: '4.10.1',
        folder: 'misc',
        path: join(dir, 'dependencies', 'misc', 'widget-4.10.1.jar'),
        source: 'BND Hub',
      });
      expect(requestedUrls(fetchMock)).toEqual([
        `${HUB_API}/widget`,
        `${HUB_RAW}/widget/widget-4.10.1.jar`,
      ]);
    });

    it('should report an unresolvable artifact as not found', async () => {
      stubFetch({ [searchUrl(TOOL)]: () => searchMiss() });

      const [outcome] = await engine.reconcileDeclared(
        [{ coordinate: TOOL, destinationFolder: 'tools' }],
        { sync: false }
      );

      expect(outcome).toEqual({
        kind: 'error',
        origin: 'declared',
        subject: 'org.example:tool',
        coordinate: TOOL,
        code: 'NOT_FOUND',
        reason: 'Not found on any source',
      });
    });

    it('should skip a pinned artifact already on disk in sync mode', async () => {
      await mkdir(join(dir, 'dependencies', 'tools'), { recursive: true });
      await writeFile(join(dir, 'dependencies', 'tools', 'tool-2.0.jar'), 'jar');
      const fetchMock = stubFetch();

      const [outcome] = await engine.reconcileDeclared(
        [{ coordinate: TOOL, destinationFolder: 'tools', pinnedVersion: '2.0' }],
        { sync: true }
      );

      expect(outcome).toEqual({
        kind: 'local-only',
        origin: 'declared',
        subject: 'org.example:tool',
        reason: 'already-exists',
        coordinate: TOOL,
        localVersion: '2.0',
        location: 'tools/tool-2.0.jar',
      });
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('should turn an unexpected failure into an error outcome', async () => {
      await mkdir(join(dir, 'dependencies'), { recursive: true });
      await writeFile(join(dir, 'dependencies', 'tools'), 'not a directory');
      stubFetch();

      const [outcome] = await engine.reconcileDeclared(
        [{ coordinate: TOOL, destinationFolder: 'tools' }],
        { sync: true }
      );

      expect(outcome).toMatchObject({
        kind: 'error',
        origin: 'declared',
        subject: 'org.example:tool',
      });
      expect(logger.messages('error')).toEqual(['Reconciliation failed']);
    });
  });

  describe('checkDeclared', () => {
    it('should classify declared artifacts without downloading', async () => {
      const fetchMock = stubFetch({
        [searchUrl(ALPHA)]: () => searchHit('org.example', 'alpha', '1.2'),
        [searchUrl(TOOL)]: () => searchHit('org.example', 'tool', '2.0'),
        [searchUrl(WIDGET)]: () => searchMiss(),
      });

      const checks = await engine.checkDeclared([
        { coordinate: ALPHA, destinationFolder: 'libs', version: '1.0', comment: 'core lib' },
        { coordinate: TOOL, destinationFolder: 'tools', version: '2.0' },
        { coordinate: ALPHA, destinationFolder: 'libs' },
        { coordinate: WIDGET, destinationFolder: 'misc', version: '4.3.0' },
      ]);

      expect(checks).toEqual([
        {
          status: 'update-available',
          coordinate: ALPHA,
          currentVersion: '1.0',
          latestVersion: '1.2',
          folder: 'libs',
          comment: 'core lib',
        },
        { status: 'current', coordinate: TOOL, currentVersion: '2.0', latestVersion: '2.0' },
        {
          status: 'update-available',
          coordinate: ALPHA,
          currentVersion: 'unpinned',
          latestVersion: '1.2',
          folder: 'libs',
          comment: undefined,
        },
        {
          status: 'not-found',
          coordinate: WIDGET,
          currentVersion: '4.3.0',
          reason: 'Not found',
        },
      ]);
      expect(requestedUrls(fetchMock).filter((url) => url.endsWith('.jar'))).toEqual([]);
    });

    it('should ask only the bundle hub when it is preferred', async () => {
      const fetchMock = stubFetch();

      const [check] = await engine.checkDeclared([
        { coordinate: WIDGET, destinationFolder: 'misc', preferredSource: 'BND Hub' },
      ]);

      expect(check).toEqual({
        status: 'not-found',
        coordinate: WIDGET,
        currentVersion: undefined,
        reason: 'Not found on the bundle hub',
      });
      expect(requestedUrls(fetchMock)).toEqual([`${HUB_API}/widget`]);
    });
  });

  describe('per-host spacing', () => {
    it('should space requests to one host across concurrent identities', async () => {
      build(4, 100);
      const searchTimes: number[] = [];
      const artifacts = ['one', 'two', 'three', 'four'];
      const routes: Record<string, FetchRoute> = {};
      for (const artifactId of artifacts) {
        routes[searchUrl({ groupId: 'org.example', artifactId })] = () => {
          searchTimes.push(Date.now());
          return searchMiss();
        };
      }
      stubFetch(routes);

      const outcomes = await engine.reconcileIndex(
        artifacts.map((artifactId) =>
          entry(`org.example.${artifactId}`, '1.0', `libs/${artifactId}-1.0.jar`)
        ),
        new Map(
          artifacts.map((artifactId): [string, BundleMapping] => [
            `org.example.${artifactId}`,
            maven({ groupId: 'org.example', artifactId }),
          ])
        )
      );

      expect(outcomes.map((outcome) => outcome.kind)).toEqual([
        'unavailable',
        'unavailable',
        'unavailable',
        'unavailable',
      ]);
      expect(searchTimes).toHaveLength(4);
      const sorted = [...searchTimes].sort((a, b) => a - b);
      for (let i = 1; i < sorted.length; i++) {
        // timer granularity allows a few milliseconds of slack
        expect((sorted[i] ?? 0) - (sorted[i - 1] ?? 0)).toBeGreaterThanOrEqual(90);
      }
    });
  });
});

describe('latestPerIdentity', () => {
  it('should break comparator ties by the higher raw string in any order', () => {
    const ga = entry('x', '1.0-GA', 'a/x-1.0-GA.jar');
    const plain = entry('x', '1.0', 'a/x-1.0.jar');

    expect(latestPerIdentity([ga, plain])).toEqual([ga]);
    expect(latestPerIdentity([plain, ga])).toEqual([ga]);
  });

  it('should sort identities', () => {
    const result = latestPerIdentity([entry('b', '1', 'f/b.jar'), entry('a', '1', 'f/a.jar')]);
    expect(result.map((item) => item.identity)).toEqual(['a', 'b']);
  });
});

describe('folderOf', () => {
  it('should return the first path segment', () => {
    expect(folderOf('libs/sub/alpha-1.0.jar')).toBe('libs');
  });

  it('should return an empty folder for a bare file name', () => {
    expect(folderOf('alpha-1.0.jar')).toBe('');
  });
});

describe('summarize', () => {
  it('should count each kind and collect written paths', () => {
    const result = summarize(
      [
        {
          kind: 'updated',
          origin: 'declared',
          subject: 'org.example:tool',
          coordinate: TOOL,
          version: '2.0',
          folder: 'tools',
          path: '/repo/tools/tool-2.0.jar',
          source: 'Maven Central',
        },
        {
          kind: 'error',
          origin: 'declared',
          subject: 'org.example:alpha',
          code: 'NOT_FOUND',
          reason: 'Not found on any source',
        },
      ],
      false
    );

    expect(result.counts.updated).toBe(1);
    expect(result.counts.error).toBe(1);
    expect(result.counts['up-to-date']).toBe(0);
    expect(result.writtenFiles).toEqual(['/repo/tools/tool-2.0.jar']);
    expect(result.indexProcessed).toBe(false);
  });
});

describe('findExistingJar', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('should report the highest versioned jar when unpinned', async () => {
    await writeFile(join(dir, 'tool-1.5.jar'), 'a');
    await writeFile(join(dir, 'tool-1.10.jar'), 'b');
    await writeFile(join(dir, 'tool-extras-9.0.jar'), 'c');

    await expect(findExistingJar(dir, 'tool', undefined)).resolves.toEqual({
      fileName: 'tool-1.10.jar',
      version: '1.10',
    });
  });

  it('should match only the exact pinned file', async () => {
    await writeFile(join(dir, 'tool-1.5.jar'), 'a');

    await expect(findExistingJar(dir, 'tool', '2.0')).resolves.toBeNull();
    await expect(findExistingJar(dir, 'tool', '1.5')).resolves.toEqual({
      fileName: 'tool-1.5.jar',
      version: '1.5',
    });
  });

  it('should return null for a missing directory', async () => {
    await expect(findExistingJar(join(dir, 'absent'), 'tool', undefined)).resolves.toBeNull();
  });
});
