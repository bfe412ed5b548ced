/**
 * Downloads Routes
 *
 * Tracked transfers and the user actions on them, addressed by title.
 */

import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { toTransferSummary, type Transfer, type TransferSummary } from '@seedsync/core';
import type { RouteOptions } from '../context.js';

const titleParamsSchema = z.object({
  title: z.string().min(1),
});

const createDownloadSchema = z.object({
  title: z.string().trim().min(1),
  download_url: z.string().trim().min(1),
  series_id: z.coerce.number().int().positive().optional(),
});

function present(summary: TransferSummary) {
  return {
    id: summary.id,
    title: summary.title,
    status: summary.status,
    progress: summary.progress,
    size_bytes: summary.sizeBytes,
    series_id: summary.seriesId,
    error: summary.error,
    notice: summary.notice,
    retry_count: summary.retryCount,
    uploaded_at: summary.uploadedAt,
  };
}

function presentTransfer(transfer: Transfer) {
  return present(toTransferSummary(transfer));
}

export const downloadRoutes: FastifyPluginAsync<RouteOptions> = async (fastify, { context }) => {
  const { orchestrator, tracker } = context;

  /**
   * List tracked transfers
   */
  fastify.get('/', async () => tracker.summaries().map(present));

  /**
   * Submit a magnet link or torrent URL
   */
  fastify.post('/', async (request) => {
    const body = createDownloadSchema.parse(request.body);

    const transfer = await orchestrator.addTransfer({
      title: body.title,
      downloadUrl: body.download_url,
      seriesId: body.series_id,
    });

    return {
      success: true,
      message: `Submitted ${transfer.title}`,
      download_id: transfer.id,
    };
  });

  fastify.get('/:title', async (request) => {
    const { title } = titleParamsSchema.parse(request.params);
    return presentTransfer(orchestrator.find(title));
  });

  /**
   * Files of the transfer as the cloud store holds them
   */
  fastify.get('/:title/files', async (request) => {
    const { title } = titleParamsSchema.parse(request.params);
    const files = await orchestrator.listFiles(title);

    return {
      success: true,
      files: files.map((file) => ({ name: file.name, size_bytes: file.sizeBytes })),
    };
  });

  fastify.post('/:title/pause', async (request) => {
    const { title } = titleParamsSchema.parse(request.params);
    await orchestrator.pause(title);
    return { success: true, message: `Paused ${title}` };
  });

  fastify.post('/:title/resume', async (request) => {
    const { title } = titleParamsSchema.parse(request.params);
    await orchestrator.resume(title);
    return { success: true, message: `Resumed ${title}` };
  });

  /**
   * Fetch the files of a completed transfer now
   */
  fastify.post('/:title/download', async (request) => {
    const { title } = titleParamsSchema.parse(request.params);
    const retrieved = await orchestrator.manualDownload(title);
    return {
      success: true,
      message: `Downloaded ${retrieved.files.length} file(s) to ${retrieved.directory}`,
    };
  });

  /**
   * Ask the library manager to import the downloaded files again
   */
  fastify.post('/:title/notify-sonarr', async (request) => {
    const { title } = titleParamsSchema.parse(request.params);
    const trigger = await orchestrator.notify(title);
    return {
      success: true,
      message: trigger.skipped
        ? 'Library manager is not configured'
        : `Library import queued (command ${trigger.commandId})`,
    };
  });

  fastify.post('/:title/retry', async (request) => {
    const { title } = titleParamsSchema.parse(request.params);
    orchestrator.retry(title);
    return { success: true, message: `Retrying ${title}` };
  });

  fastify.delete('/:title', async (request) => {
    const { title } = titleParamsSchema.parse(request.params);
    await orchestrator.delete(title);
    return { success: true, message: `Deleted ${title}` };
  });
};
