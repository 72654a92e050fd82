import { promises as fs, type Stats } from 'node:fs';
import path from 'node:path';
import type { ServiceConfig } from '../config/serviceConfig';
import type { ServiceLogger } from '../logger';
import { isMissing, removeDirectory } from '../staging/chunkStore';

export interface SweepOptions {
  stagingRoot: string;
  ttlMs: number;
  now?: number;
  logger?: ServiceLogger;
  remove?: (directory: string) => Promise<void>;
}

export interface SweepResult {
  removed: string[];
  failed: string[];
  retained: number;
}

/** Birth time where the filesystem records it, otherwise inode change time. */
export function resolveCreatedAtMs(stats: Pick<Stats, 'birthtimeMs' | 'ctimeMs'>): number {
  return stats.birthtimeMs > 0 ? stats.birthtimeMs : stats.ctimeMs;
}

async function listDirectories(directory: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(directory, { withFileTypes: true });
    return entries.filter((entry) => entry.isDirectory()).map((entry) => path.join(directory, entry.name));
  } catch (error) {
    if (isMissing(error)) {
      return [];
    }
    throw error;
  }
}

/**
 * Deletes `{stagingRoot}/{user}/{dataset}` directories whose age is strictly
 * greater than `ttlMs`. A directory that cannot be listed or removed is
 * logged and reported in `failed`; the sweep moves on.
 */
export async function sweepStaleUploads(options: SweepOptions): Promise<SweepResult> {
  const now = options.now ?? Date.now();
  const remove = options.remove ?? removeDirectory;
  const result: SweepResult = { removed: [], failed: [], retained: 0 };

  for (const userDir of await listDirectories(options.stagingRoot)) {
    let uploadDirs: string[];
    try {
      uploadDirs = await listDirectories(userDir);
    } catch (err) {
      options.logger?.warn({ err, userDir }, '[tabletalk:reaper] failed to list user staging directory');
      result.failed.push(userDir);
      continue;
    }

    for (const uploadDir of uploadDirs) {
      let createdAtMs: number;
      try {
        createdAtMs = resolveCreatedAtMs(await fs.stat(uploadDir));
      } catch (err) {
        if (!isMissing(err)) {
          options.logger?.warn({ err, uploadDir }, '[tabletalk:reaper] failed to stat upload directory');
          result.failed.push(uploadDir);
        }
        continue;
      }

      if (now - createdAtMs <= options.ttlMs) {
        result.retained += 1;
        continue;
      }

      try {
        await remove(uploadDir);
        result.removed.push(uploadDir);
      } catch (err) {
        options.logger?.error({ err, uploadDir }, '[tabletalk:reaper] failed to remove stale upload');
        result.failed.push(uploadDir);
      }
    }
  }

  return result;
}

interface ReaperOptions {
  config: ServiceConfig;
  logger: ServiceLogger;
}

let reaperManager: { stop: () => Promise<void> } | null = null;

export async function initializeStaleUploadReaper({ config, logger }: ReaperOptions): Promise<void> {
  if (reaperManager) {
    await reaperManager.stop();
    reaperManager = null;
  }

  const { ttlMs, intervalMs } = config.reaper;
  const { stagingRoot } = config.storage;

  let runningSweep: Promise<void> | null = null;
  let timer: NodeJS.Timeout | null = null;
  let stopped = false;

  const runSweep = () => {
    if (runningSweep) {
      return runningSweep;
    }
    runningSweep = (async () => {
      try {
        const result = await sweepStaleUploads({ stagingRoot, ttlMs, logger });
        if (result.removed.length > 0 || result.failed.length > 0) {
          logger.info(
            { removed: result.removed.length, failed: result.failed.length, retained: result.retained },
            '[tabletalk:reaper] swept stale uploads'
          );
        }
      } catch (err) {
        logger.error({ err, stagingRoot }, '[tabletalk:reaper] stale upload sweep failed');
      } finally {
        runningSweep = null;
      }
    })();
    return runningSweep;
  };

  timer = setInterval(() => {
    if (!stopped) {
      void runSweep();
    }
  }, intervalMs);
  if (typeof timer.unref === 'function') {
    timer.unref();
  }

  reaperManager = {
    stop: async () => {
      stopped = true;
      if (timer) {
        clearInterval(timer);
        timer = null;
      }
      if (runningSweep) {
        await runningSweep;
      }
    }
  };

  void runSweep();
}

export async function shutdownStaleUploadReaper(): Promise<void> {
  if (!reaperManager) {
    return;
  }
  const current = reaperManager;
  reaperManager = null;
  await current.stop();
}
