/**
 * User Routes
 */

import type { FastifyPluginAsync } from 'fastify';
import { UpstreamError } from '@seedsync/core';
import type { RouteOptions } from '../context.js';

export const userRoutes: FastifyPluginAsync<RouteOptions> = async (fastify, { context }) => {
  const { cloud, credentials } = context;

  /**
   * The logged-in cloud store account and its storage use
   */
  fastify.get('/', async () => {
    const result = await credentials.withCredential((credential) => cloud.getAccount(credential));
    if (!result.ok) {
      throw new UpstreamError('cloud store', result.error);
    }

    const account = result.value;
    return {
      success: true,
      username: account.username,
      email: account.email,
      space_used: account.spaceUsedBytes,
      space_max: account.spaceMaxBytes,
      premium: account.premium,
    };
  });
};
