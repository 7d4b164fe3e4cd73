import { copyFile, mkdir, rename, rm, stat, unlink } from 'node:fs/promises';
import { basename, dirname, extname, join } from 'node:path';
import pLimit from 'p-limit';
import { RoutingError, errorMessage } from '@nfe-intake/shared';

/**
 * Places a source file in its terminal area and returns the final path.
 */
export interface DocumentRouter {
  placeInProcessed(source: string): Promise<string>;
  placeInError(source: string): Promise<string>;
}

export interface FileRouterOptions {
  processedPath: string;
  errorPath: string;
}

/**
 * Free name for `fileName` inside `directory`: the name itself, or
 * `<stem>_<NNN><ext>` counting from 001 until one is unused.
 */
export async function uniqueDestination(directory: string, fileName: string): Promise<string> {
  const ext = extname(fileName);
  const stem = ext === '' ? fileName : fileName.slice(0, -ext.length);

  let candidate = join(directory, fileName);
  for (let counter = 1; await exists(candidate); counter++) {
    candidate = join(directory, `${stem}_${String(counter).padStart(3, '0')}${ext}`);
  }
  return candidate;
}

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Moves source files into their terminal area.
 *
 * Placements run one at a time so two files never claim the same
 * destination name.
 */
export class FileRouter implements DocumentRouter {
  private readonly placeLimit = pLimit(1);

  constructor(private readonly options: FileRouterOptions) {}

  placeInProcessed(source: string): Promise<string> {
    return this.place(source, this.options.processedPath);
  }

  placeInError(source: string): Promise<string> {
    return this.place(source, this.options.errorPath);
  }

  private place(source: string, targetDir: string): Promise<string> {
    return this.placeLimit(async () => {
      try {
        await mkdir(targetDir, { recursive: true });
        const destination = await uniqueDestination(targetDir, basename(source));
        await moveFile(source, destination);
        return destination;
      } catch (error) {
        throw new RoutingError(
          `Failed to move ${source} to ${targetDir}: ${errorMessage(error)}`,
          source,
          targetDir,
          error,
        );
      }
    });
  }
}

/**
 * Rename, or across volumes copy to a hidden name beside the destination,
 * rename it into place and remove the source.
 */
async function moveFile(source: string, destination: string): Promise<void> {
  try {
    await rename(source, destination);
    return;
  } catch (error) {
    if (!isErrnoException(error) || error.code !== 'EXDEV') {
      throw error;
    }
  }

  const temporary = join(dirname(destination), `.${basename(destination)}.partial`);
  try {
    await copyFile(source, temporary);
    await rename(temporary, destination);
  } catch (error) {
    await rm(temporary, { force: true });
    throw error;
  }
  await unlink(source);
}
