/**
 * Library Routes
 *
 * Read-only passthrough of the library manager's catalog.
 */

import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { NotFoundError, UpstreamError } from '@seedsync/core';
import type { RouteOptions } from '../context.js';

const LIBRARY = 'library manager';

const seriesParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
});

export const libraryRoutes: FastifyPluginAsync<RouteOptions> = async (fastify, { context }) => {
  const { library } = context;

  fastify.get('/series', async () => {
    const result = await library.listSeries();
    if (!result.ok) {
      throw new UpstreamError(LIBRARY, result.error);
    }
    return { success: true, configured: library.isConfigured, series: result.value };
  });

  fastify.get('/series/:id', async (request) => {
    const { id } = seriesParamsSchema.parse(request.params);
    const result = await library.getSeries(id);
    if (!result.ok) {
      throw new UpstreamError(LIBRARY, result.error);
    }
    if (!result.value) {
      throw new NotFoundError('Series', String(id));
    }
    return { success: true, series: result.value };
  });

  fastify.get('/rootfolders', async () => {
    const result = await library.listRootFolders();
    if (!result.ok) {
      throw new UpstreamError(LIBRARY, result.error);
    }
    return { success: true, configured: library.isConfigured, rootfolders: result.value };
  });
};
