import { createReadStream, promises as fs } from 'node:fs';
import path from 'node:path';
import { MissingChunkError } from '../errors';
import { chunkFileName, isMissing } from '../staging/chunkStore';

export interface AssembleOptions {
  signal?: AbortSignal;
}

export interface AssemblyResult {
  destinationPath: string;
  chunkCount: number;
  bytesWritten: number;
}

async function findFirstMissingChunk(stagingDir: string, totalChunks: number): Promise<number | null> {
  for (let index = 0; index < totalChunks; index += 1) {
    try {
      const stats = await fs.stat(path.join(stagingDir, chunkFileName(index)));
      if (!stats.isFile()) {
        return index;
      }
    } catch (error) {
      if (isMissing(error)) {
        return index;
      }
      throw error;
    }
  }
  return null;
}

/**
 * Concatenates `chunk_0 .. chunk_{totalChunks-1}` into `destinationPath` in
 * ascending index order. Every chunk must be present before the destination
 * is opened; on any failure the destination is removed.
 */
export async function assembleChunks(
  stagingDir: string,
  totalChunks: number,
  destinationPath: string,
  options: AssembleOptions = {}
): Promise<AssemblyResult> {
  if (!Number.isInteger(totalChunks) || totalChunks <= 0) {
    throw new RangeError(`totalChunks must be a positive integer (received ${totalChunks})`);
  }
  options.signal?.throwIfAborted();

  const missing = await findFirstMissingChunk(stagingDir, totalChunks);
  if (missing !== null) {
    await fs.rm(destinationPath, { force: true });
    throw new MissingChunkError(missing);
  }

  await fs.mkdir(path.dirname(destinationPath), { recursive: true });
  const handle = await fs.open(destinationPath, 'w');
  let bytesWritten = 0;
  try {
    for (let index = 0; index < totalChunks; index += 1) {
      options.signal?.throwIfAborted();
      const chunkPath = path.join(stagingDir, chunkFileName(index));
      try {
        for await (const block of createReadStream(chunkPath)) {
          if (!Buffer.isBuffer(block)) {
            throw new TypeError(`Unexpected string block while reading ${chunkPath}`);
          }
          const { bytesWritten: written } = await handle.write(block);
          bytesWritten += written;
        }
      } catch (error) {
        // a chunk can vanish between the presence check and the read (e.g. the reaper)
        if (isMissing(error)) {
          throw new MissingChunkError(index);
        }
        throw error;
      }
    }
    await handle.close();
  } catch (error) {
    await handle.close().catch(() => undefined);
    await fs.rm(destinationPath, { force: true });
    throw error;
  }

  return { destinationPath, chunkCount: totalChunks, bytesWritten };
}
