/**
 * Repository Index Generator
 *
 * Rebuilds `index.xml` by handing every JAR in the repository folders to
 * the bnd `index` command, then publishes the gzipped copy and a sha256
 * digest next to it. The indexing tool is a black box behind
 * CommandRunner; tests substitute a fake.
 */

import { execFile } from 'node:child_process';
import { createHash } from 'node:crypto';
import type { Dirent } from 'node:fs';
import { readFile, readdir, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { promisify } from 'node:util';
import { gzipSync } from 'node:zlib';
import type { SyncConfig } from '../core/config.js';
import { errorMessage, isMissingFileError } from '../core/errors.js';
import { atomicWriteFile } from '../core/utils/atomic-write.js';
import type { Logger } from '../core/utils/logger.js';
import { createLogger } from '../core/utils/logger.js';

const execFileAsync = promisify(execFile);

// ============================================================================
// Types
// ============================================================================

export interface CommandResult {
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
}

export interface CommandRunner {
  run(command: string, args: readonly string[], options: { cwd: string }): Promise<CommandResult>;
}

export interface RegenerateResult {
  readonly ok: boolean;
  readonly jarCount: number;
  /** Resources in the written index (0 when generation failed) */
  readonly resourceCount: number;
  readonly error?: string;
}

// ============================================================================
// Default Runner
// ============================================================================

/**
 * Runs commands with child_process.execFile; a non-zero exit is a result,
 * not an exception
 */
export const execFileRunner: CommandRunner = {
  async run(command, args, options) {
    try {
      const { stdout, stderr } = await execFileAsync(command, [...args], {
        cwd: options.cwd,
        maxBuffer: 64 * 1024 * 1024,
      });
      return { exitCode: 0, stdout, stderr };
    } catch (error) {
      if (!(error instanceof Error)) {
        throw error;
      }
      const exitCode = 'code' in error && typeof error.code === 'number' ? error.code : 1;
      const stderr =
        'stderr' in error && typeof error.stderr === 'string' && error.stderr !== ''
          ? error.stderr
          : error.message;
      return { exitCode, stdout: '', stderr };
    }
  },
};

// ============================================================================
// Generation
// ============================================================================

/**
 * Regenerate the repository index, its `.gz` copy and its `.sha` digest
 */
export async function regenerateIndex(
  config: SyncConfig,
  runner: CommandRunner = execFileRunner,
  logger: Logger = createLogger({ module: 'index-generator' })
): Promise<RegenerateResult> {
  const { paths } = config;

  if (!(await isFile(paths.bndJar))) {
    logger.error('bnd JAR not found', { path: paths.bndJar });
    return {
      ok: false,
      jarCount: 0,
      resourceCount: 0,
      error: `bnd JAR not found: ${paths.bndJar}`,
    };
  }

  const jars: string[] = [];
  for (const folder of paths.indexFolders) {
    jars.push(...(await collectJars(join(paths.root, folder))));
  }
  logger.info('Indexing JARs', { count: jars.length });

  const args = ['-jar', paths.bndJar, 'index', '-r', paths.index, '-n', config.indexName, ...jars];
  const result = await runner.run('java', args, { cwd: paths.root });

  if (result.exitCode !== 0) {
    logger.error('Index generation failed', { exitCode: result.exitCode, stderr: result.stderr });
    return {
      ok: false,
      jarCount: jars.length,
      resourceCount: 0,
      error: result.stderr || `java exited with code ${result.exitCode}`,
    };
  }

  let index: Buffer;
  try {
    index = await readFile(paths.index);
  } catch (error) {
    logger.error('Index file missing after generation', { path: paths.index });
    return {
      ok: false,
      jarCount: jars.length,
      resourceCount: 0,
      error: `Cannot read generated index: ${errorMessage(error)}`,
    };
  }

  const resourceCount = countResources(index.toString('utf-8'));
  try {
    await atomicWriteFile(`${paths.index}.gz`, gzipSync(index));
    await atomicWriteFile(`${paths.index}.sha`, createHash('sha256').update(index).digest('hex'));
  } catch (error) {
    logger.error('Cannot write index companions', {
      path: paths.index,
      error: errorMessage(error),
    });
    return {
      ok: false,
      jarCount: jars.length,
      resourceCount,
      error: `Cannot write index companions: ${errorMessage(error)}`,
    };
  }

  logger.info('Index regenerated', {
    path: paths.index,
    jars: jars.length,
    resources: resourceCount,
  });
  return { ok: true, jarCount: jars.length, resourceCount };
}

/**
 * Every `*.jar` below a directory, sorted; a missing directory yields none
 */
export async function collectJars(directory: string): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await readdir(directory, { withFileTypes: true });
  } catch (error) {
    if (isMissingFileError(error)) {
      return [];
    }
    throw error;
  }

  const jars: string[] = [];
  for (const entry of entries) {
    const path = join(directory, entry.name);
    if (entry.isDirectory()) {
      jars.push(...(await collectJars(path)));
    } else if (entry.isFile() && entry.name.endsWith('.jar')) {
      jars.push(path);
    }
  }
  return jars.sort();
}

export function countResources(indexXml: string): number {
  return indexXml.split('<resource').length - 1;
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch (error) {
    if (isMissingFileError(error)) {
      return false;
    }
    throw error;
  }
}
