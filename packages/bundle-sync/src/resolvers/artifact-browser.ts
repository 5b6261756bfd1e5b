/**
 * Artifact Browser Source
 *
 * Fallback lookup that scrapes the public artifact browser page
 * (`<browserUrl>/<group>/<artifact>`). The newest release is the first
 * `vbtn release` anchor on the page. The markup also names the repositories
 * that host the artifact; those become download hints for the fetcher.
 *
 * The page is HTML meant for people, so this source is best-effort. The
 * browser refuses tool user agents, so requests go out with a browser one.
 */

import { NotFoundError } from '../core/errors.js';
import type { HTTPClient } from '../core/http-client.js';
import { SOURCE_NAMES, formatCoordinate } from '../core/types.js';
import type { ArtifactCoordinate, RepositoryDescriptor, ResolvedVersion } from '../core/types.js';
import type { VersionSource } from './types.js';

const RELEASE_ANCHOR = /<a[^>]*class="vbtn release"[^>]*>([^<]+)<\/a>/;

/**
 * Marker strings and the repository each one implies
 */
export interface RepositoryMarker {
  readonly markers: readonly string[];
  readonly repository: RepositoryDescriptor;
}

export const DEFAULT_REPOSITORY_MARKERS: readonly RepositoryMarker[] = [
  {
    markers: ['repo1.maven.org', 'Maven Central'],
    repository: { name: 'Maven Central', url: 'https://repo1.maven.org/maven2' },
  },
  {
    markers: ['repository.spring.io', 'Spring'],
    repository: { name: 'Spring Plugins', url: 'https://repo.spring.io/plugins-release' },
  },
  {
    markers: ['repository.jboss.org'],
    repository: {
      name: 'JBoss',
      url: 'https://repository.jboss.org/nexus/content/repositories/releases',
    },
  },
];

export interface ArtifactBrowserOptions {
  readonly browserUrl: string;
  readonly userAgent: string;
  readonly timeoutMs: number;
  readonly markers?: readonly RepositoryMarker[];
}

export class ArtifactBrowserSource implements VersionSource {
  readonly name = SOURCE_NAMES.ARTIFACT_BROWSER;

  constructor(
    private readonly http: HTTPClient,
    private readonly options: ArtifactBrowserOptions
  ) {}

  async lookup(coordinate: ArtifactCoordinate): Promise<ResolvedVersion> {
    const url = `${this.options.browserUrl}/${coordinate.groupId}/${coordinate.artifactId}`;
    const html = await this.http.fetchText(url, {
      timeoutMs: this.options.timeoutMs,
      headers: { 'User-Agent': this.options.userAgent },
    });

    const version = extractReleaseVersion(html);
    if (!version) {
      throw new NotFoundError(`No release listed for ${formatCoordinate(coordinate)}`);
    }

    return {
      version,
      sourceName: this.name,
      candidateRepositories: inferRepositories(
        html,
        this.options.markers ?? DEFAULT_REPOSITORY_MARKERS
      ),
    };
  }
}

/**
 * Read the first release anchor's text
 */
export function extractReleaseVersion(html: string): string | null {
  const match = RELEASE_ANCHOR.exec(html);
  const version = match?.[1]?.trim();
  return version ? version : null;
}

/**
 * Repositories whose markers appear in the page, in marker order.
 * Falls back to the first marker's repository when nothing matches.
 */
export function inferRepositories(
  html: string,
  markers: readonly RepositoryMarker[] = DEFAULT_REPOSITORY_MARKERS
): RepositoryDescriptor[] {
  const found = markers
    .filter((marker) => marker.markers.some((text) => html.includes(text)))
    .map((marker) => marker.repository);

  if (found.length > 0) {
    return found;
  }
  const [fallback] = markers;
  return fallback ? [fallback.repository] : [];
}
