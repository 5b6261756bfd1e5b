/**
 * CLI Context
 *
 * Exit codes, global option parsing, and the per-invocation context every
 * command runs with.
 *
 * @module cli/context
 */

import { z } from 'zod';
import { ConfigError, errorMessage } from '../core/errors.js';
import type { CommandRunner } from '../index-generator/index-generator.js';
import { loadConfig } from './lib/config.js';
import type { CLIConfig } from './lib/config.js';
import { createCLILogger } from './lib/logger.js';
import type { CLILogger } from './lib/logger.js';

// ============================================================================
// Exit Codes
// ============================================================================

export const EXIT_CODES = {
  SUCCESS: 0,
  ERRORS: 1,
  HALTED: 2,
  CONFIG_ERROR: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

// ============================================================================
// Global Options
// ============================================================================

export const GlobalOptionsSchema = z.object({
  config: z.string().optional(),
  root: z.string().optional(),
  verbose: z.boolean().optional(),
  json: z.boolean().optional(),
  timeout: z.number().int().positive().optional(),
  concurrency: z.number().int().positive().optional(),
});

export type GlobalOptions = z.infer<typeof GlobalOptionsSchema>;

export interface CLIContext {
  readonly config: CLIConfig;
  readonly logger: CLILogger;
}

/**
 * Seams a command accepts in place of its real collaborators
 */
export interface CommandDependencies {
  /** Runs the indexing tool */
  readonly runner?: CommandRunner;
  /** Receives command output (default: stdout) */
  readonly print?: (text: string) => void;
  readonly now?: () => Date;
}

/**
 * Load configuration for one invocation and build its logger
 *
 * @throws {ConfigError} If the configuration is invalid
 */
export function initializeContext(options: GlobalOptions): CLIContext {
  const config = loadConfig({
    configPath: options.config,
    overrides: {
      root: options.root,
      verbose: options.verbose,
      json: options.json,
      timeout: options.timeout,
      concurrency: options.concurrency,
    },
  });

  const logger = createCLILogger({
    level: config.verbose ? 'debug' : 'info',
    json: config.json,
  });

  return { config, logger };
}

/**
 * Map a failure that escaped a command to its exit code. Anything other
 * than a config error (a malformed index included) halts the run.
 */
export function exitCodeForError(error: unknown): ExitCode {
  if (error instanceof ConfigError) {
    return EXIT_CODES.CONFIG_ERROR;
  }
  return EXIT_CODES.HALTED;
}

/**
 * Run a command body, logging start, end and any escaping failure
 */
export async function runCommand(
  context: CLIContext,
  name: string,
  body: () => Promise<ExitCode>
): Promise<ExitCode> {
  const { logger } = context;
  logger.commandStart(name, { root: context.config.sync.paths.root });

  try {
    const code = await body();
    logger.commandEnd(code === EXIT_CODES.SUCCESS, { exitCode: code });
    return code;
  } catch (error) {
    const code = exitCodeForError(error);
    logger.error(errorMessage(error), {
      error: error instanceof Error ? error.name : 'Error',
    });
    logger.commandEnd(false, { exitCode: code });
    return code;
  }
}
