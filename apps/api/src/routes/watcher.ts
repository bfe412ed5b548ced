/**
 * Watcher Routes
 *
 * Control of the torrent folder watcher and the activity log.
 */

import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { readLastLines } from '@seedsync/utils';
import type { RouteOptions } from '../context.js';

const startQuerySchema = z.object({
  torrent_dir: z.string().trim().min(1).optional(),
  download_dir: z.string().trim().min(1).optional(),
  interval_ms: z.coerce.number().int().min(1_000).optional(),
});

const fileBodySchema = z.object({
  path: z.string().trim().min(1),
});

const logsQuerySchema = z.object({
  lines: z.coerce.number().int().min(1).max(1_000).default(100),
});

/**
 * Activity log lines are pino JSON; anything else is passed through as the message
 */
function parseLogLine(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch {
    return { msg: line };
  }
}

export const watcherRoutes: FastifyPluginAsync<RouteOptions> = async (fastify, { context }) => {
  const { watcher, config } = context;

  fastify.get('/status', async () => {
    const status = watcher.status();
    return {
      running: status.running,
      torrent_dir: status.torrentDir,
      download_dir: status.downloadDir,
      interval_ms: status.intervalMs,
    };
  });

  /**
   * Start watching; directories left out keep their saved values
   */
  fastify.post('/start', async (request) => {
    const query = startQuerySchema.parse(request.query);

    const status = await watcher.start({
      torrentDir: query.torrent_dir,
      downloadDir: query.download_dir,
      intervalMs: query.interval_ms,
    });

    return { success: true, message: `Watching ${status.torrentDir ?? ''}` };
  });

  fastify.post('/stop', async () => {
    await watcher.stop();
    return { success: true, message: 'Watcher stopped' };
  });

  /**
   * Descriptor files waiting in the watched directory
   */
  fastify.get('/scan', async () => {
    const pending = await watcher.folderWatcher().listPending();
    return {
      success: true,
      torrents: pending.map((file) => ({
        name: file.name,
        path: file.path,
        size_bytes: file.sizeBytes,
        modified_at: file.modifiedAt,
        stable: file.stable,
      })),
    };
  });

  /**
   * Submit one waiting file now
   */
  fastify.post('/upload', async (request) => {
    const { path } = fileBodySchema.parse(request.body);
    const result = await watcher.folderWatcher().dispatchFile(path);

    if (result.outcome === 'error') {
      return { success: false, message: `Failed to submit ${result.name}: ${result.error ?? 'unknown error'}` };
    }
    return { success: true, message: `Submitted ${result.name}` };
  });

  fastify.post('/delete-file', async (request) => {
    const { path } = fileBodySchema.parse(request.body);
    await watcher.folderWatcher().deleteFile(path);
    return { success: true, message: `Deleted ${path}` };
  });

  /**
   * Tail of the activity log
   */
  fastify.get('/logs', async (request) => {
    const { lines } = logsQuerySchema.parse(request.query);
    const tail = await readLastLines(config.activityLogPath, lines);
    return { success: true, logs: tail.map(parseLogLine) };
  });
};
