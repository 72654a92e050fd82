import { promises as fs } from 'node:fs';
import path from 'node:path';
import { ChunkWriteError } from '../errors';

const CHUNK_FILE_PATTERN = /^chunk_(\d+)$/;

export function chunkFileName(chunkIndex: number): string {
  return `chunk_${chunkIndex}`;
}

/**
 * Staging area for in-flight uploads, laid out as
 * `{stagingRoot}/{userId}/{datasetId}/chunk_{index}`.
 *
 * Chunks may arrive in any order; the index is only used as the file name.
 */
export class ChunkStore {
  constructor(private readonly stagingRoot: string) {}

  stagingDirectory(userId: string, datasetId: string): string {
    return path.join(this.stagingRoot, userId, datasetId);
  }

  chunkPath(userId: string, datasetId: string, chunkIndex: number): string {
    return path.join(this.stagingDirectory(userId, datasetId), chunkFileName(chunkIndex));
  }

  async putChunk(userId: string, datasetId: string, chunkIndex: number, data: Uint8Array): Promise<string> {
    const target = this.chunkPath(userId, datasetId, chunkIndex);
    try {
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.writeFile(target, data);
    } catch (error) {
      await fs.rm(target, { force: true }).catch(() => undefined);
      throw new ChunkWriteError(chunkIndex, error);
    }
    return target;
  }

  async listChunks(userId: string, datasetId: string): Promise<number[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.stagingDirectory(userId, datasetId));
    } catch (error) {
      if (isMissing(error)) {
        return [];
      }
      throw error;
    }
    const indices: number[] = [];
    for (const entry of entries) {
      const match = CHUNK_FILE_PATTERN.exec(entry);
      if (match) {
        indices.push(Number.parseInt(match[1], 10));
      }
    }
    return indices.sort((a, b) => a - b);
  }

  async discard(userId: string, datasetId: string): Promise<void> {
    await removeDirectory(this.stagingDirectory(userId, datasetId));
  }
}

export async function removeDirectory(directory: string): Promise<void> {
  await fs.rm(directory, { recursive: true, force: true });
}

export function isMissing(error: unknown): boolean {
  return Boolean(error && typeof error === 'object' && 'code' in error && error.code === 'ENOENT');
}
