/**
 * Health Routes
 *
 * Liveness and component status.
 */

import type { FastifyPluginAsync } from 'fastify';
import type { AppContext, RouteOptions } from '../context.js';

interface HealthStatus {
  status: 'healthy' | 'degraded';
  version: string;
  uptime: number;
  timestamp: string;
  checks: {
    cloud: CheckResult;
    library: CheckResult;
    watcher: CheckResult;
  };
  transfers: {
    tracked: number;
    fetching: number;
  };
}

interface CheckResult {
  status: 'pass' | 'fail' | 'skip';
  latencyMs?: number;
  error?: string;
}

export const healthRoutes: FastifyPluginAsync<RouteOptions> = async (fastify, { context }) => {
  // Basic liveness probe (fast, always returns 200 if running)
  fastify.get('/', async () => ({
    status: 'ok',
    timestamp: new Date().toISOString(),
  }));

  // Component status; degraded components never fail the probe
  fastify.get('/ready', async () => {
    const checks: HealthStatus['checks'] = {
      cloud: await checkCloud(context),
      library: await checkLibrary(context),
      watcher: context.watcher.isRunning ? { status: 'pass' } : { status: 'skip' },
    };

    const status: HealthStatus = {
      status: Object.values(checks).some((c) => c.status === 'fail') ? 'degraded' : 'healthy',
      version: process.env['npm_package_version'] || '1.0.0',
      uptime: Math.round((Date.now() - context.startedAt) / 1000),
      timestamp: new Date().toISOString(),
      checks,
      transfers: {
        tracked: context.tracker.size,
        fetching: context.orchestrator.activeFetches,
      },
    };

    return status;
  });
};

async function checkCloud(context: AppContext): Promise<CheckResult> {
  return (await context.credentials.isAuthenticated())
    ? { status: 'pass' }
    : { status: 'fail', error: 'not logged in' };
}

async function checkLibrary(context: AppContext): Promise<CheckResult> {
  if (!context.library.isConfigured) {
    return { status: 'skip' };
  }

  const start = Date.now();
  const result = await context.library.listRootFolders();
  if (!result.ok) {
    return { status: 'fail', error: result.error.message };
  }
  return { status: 'pass', latencyMs: Date.now() - start };
}
