/**
 * Atomic Write Utilities
 *
 * Write-to-temp-then-rename, so a target path holds either the previous
 * content or the complete new content, never a partial artifact.
 *
 * **Pattern:**
 * 1. Write to a temporary sibling (PID + timestamp + counter in the name)
 * 2. Rename onto the target path (atomic on POSIX)
 * 3. Remove the temporary file if anything fails
 */

import { mkdir, rename, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

let tempCounter = 0;

/**
 * Atomically write string or binary data to a file
 *
 * Parent directories are created as needed.
 *
 * @example
 * ```typescript
 * await atomicWriteFile('/repo/dependencies/misc/foo-1.0.jar', jarBytes);
 * ```
 */
export async function atomicWriteFile(
  filePath: string,
  data: string | Uint8Array,
  encoding: BufferEncoding = 'utf-8'
): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });

  const tempPath = `${filePath}.${process.pid}.${Date.now()}.${tempCounter++}.tmp`;

  try {
    if (typeof data === 'string') {
      await writeFile(tempPath, data, encoding);
    } else {
      await writeFile(tempPath, data);
    }
    await rename(tempPath, filePath);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
}
