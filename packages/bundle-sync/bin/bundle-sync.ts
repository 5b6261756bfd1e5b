#!/usr/bin/env tsx
/**
 * Bundle Sync CLI Entry Point
 *
 * @module bundle-sync-cli
 */

import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

import { EXIT_CODES } from '../src/cli/context.js';
import { createProgram } from '../src/cli/program.js';
import { errorMessage } from '../src/core/errors.js';

const PackageJsonSchema = z.object({ version: z.string() });

function getVersion(): string {
  const __dirname = dirname(fileURLToPath(import.meta.url));
  const packageJsonPath = join(__dirname, '..', 'package.json');
  try {
    const parsed = PackageJsonSchema.safeParse(JSON.parse(readFileSync(packageJsonPath, 'utf-8')));
    return parsed.success ? parsed.data.version : '0.0.0';
  } catch (error) {
    console.warn(`Cannot read version from ${packageJsonPath}: ${errorMessage(error)}`);
    return '0.0.0';
  }
}

createProgram(getVersion())
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(`Fatal: ${errorMessage(error)}`);
    process.exitCode = EXIT_CODES.HALTED;
  });
