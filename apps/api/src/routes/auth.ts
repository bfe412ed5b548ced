/**
 * Authentication Routes
 *
 * Device-flow login against the cloud store, status and logout.
 */

import type { FastifyPluginAsync } from 'fastify';
import { UpstreamError } from '@seedsync/core';
import type { RouteOptions } from '../context.js';

export const authRoutes: FastifyPluginAsync<RouteOptions> = async (fastify, { context }) => {
  const { credentials, deviceLogin } = context;

  /**
   * Begin a device login; the user enters the code at the verification URI
   */
  fastify.post('/login', async () => {
    const result = await deviceLogin.start();
    if (!result.ok) {
      throw new UpstreamError('cloud store', result.error);
    }

    const session = result.value;
    return {
      success: true,
      user_code: session.userCode,
      verification_uri: session.verificationUri,
      expires_in: Math.max(0, Math.round((session.expiresAt - Date.now()) / 1000)),
    };
  });

  fastify.get('/status', async () => ({
    authenticated: await credentials.isAuthenticated(),
  }));

  /**
   * Progress of the login started by POST /login
   */
  fastify.get('/poll', async () => {
    const status = deviceLogin.getStatus();

    switch (status.state) {
      case 'authenticated':
        return { success: true, status: status.state, redirect: '/' };
      case 'pending':
        return { success: true, status: status.state };
      case 'idle':
        return (await credentials.isAuthenticated())
          ? { success: true, status: 'authenticated', redirect: '/' }
          : { success: false, status: status.state };
      default:
        return { success: false, status: status.state, error: status.error };
    }
  });

  fastify.post('/logout', async () => {
    deviceLogin.cancel();
    await credentials.clear();
    fastify.log.info('Logged out of the cloud store');
    return { success: true };
  });
};
