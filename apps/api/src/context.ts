/**
 * Application Context
 *
 * Builds every long-lived component once and hands them to the routes.
 */

import type { Dispatcher } from 'undici';
import { CloudClient, CredentialManager, DeviceLogin, TokenStore, type CloudStore } from '@seedsync/cloud';
import { LibraryClient } from '@seedsync/library';
import {
  Scheduler,
  SyncOrchestrator,
  TransferStore,
  TransferTracker,
  WatcherService,
  WatcherSettingsStore,
  type TimerSource,
} from '@seedsync/sync';
import type { Logger } from '@seedsync/utils';
import type { AppConfig } from './config/index.js';

export const RECONCILE_TASK = 'reconcile';
export const TOKEN_CHECK_TASK = 'token-check';

export interface AppContext {
  config: AppConfig;
  logger: Logger;
  startedAt: number;
  tokens: TokenStore;
  credentials: CredentialManager;
  cloud: CloudStore;
  deviceLogin: DeviceLogin;
  library: LibraryClient;
  tracker: TransferTracker;
  orchestrator: SyncOrchestrator;
  watcher: WatcherService;
  scheduler: Scheduler;
}

export interface ContextOverrides {
  cloud?: CloudStore;
  library?: LibraryClient;
  /** Outbound HTTP, for the real clients */
  dispatcher?: Dispatcher;
  timers?: TimerSource;
}

/**
 * Options every route plugin receives
 */
export interface RouteOptions {
  context: AppContext;
}

export async function createContext(
  config: AppConfig,
  logger: Logger,
  overrides: ContextOverrides = {}
): Promise<AppContext> {
  const http = { dispatcher: overrides.dispatcher, timeoutMs: config.httpTimeoutMs };

  const cloud =
    overrides.cloud ??
    new CloudClient({
      baseUrl: config.cloud.baseUrl,
      clientId: config.cloud.clientId,
      scope: config.cloud.scope,
      http,
      logger: logger.child({ component: 'cloud-client' }),
    });

  const library =
    overrides.library ??
    new LibraryClient({
      host: config.library.host,
      apiKey: config.library.apiKey,
      http,
      logger: logger.child({ component: 'library-client' }),
    });

  const tokens = new TokenStore({
    path: config.credentialsPath,
    secret: config.credentialsSecret,
    safetyMarginMs: config.tokenSafetyMarginMs,
    logger: logger.child({ component: 'token-store' }),
  });
  const credentials = new CredentialManager({
    store: tokens,
    cloud,
    logger: logger.child({ component: 'credentials' }),
  });
  const deviceLogin = new DeviceLogin({
    cloud,
    credentials,
    timeoutMs: config.deviceLoginTimeoutMs,
    logger: logger.child({ component: 'device-login' }),
  });

  const tracker = new TransferTracker({
    store: new TransferStore(config.transfersPath, logger.child({ component: 'transfer-store' })),
    matching: config.titleMatching,
    logger: logger.child({ component: 'transfer-tracker' }),
  });
  await tracker.load();

  const scheduler = new Scheduler({ timers: overrides.timers, logger: logger.child({ component: 'scheduler' }) });

  // The watcher needs the orchestrator to dispatch and the orchestrator reads
  // the watcher's download directory, so the dispatch closes over it lazily
  let orchestrator: SyncOrchestrator | null = null;
  const watcher = new WatcherService({
    settings: new WatcherSettingsStore(config.watcherSettingsPath, logger.child({ component: 'watcher-settings' })),
    scheduler,
    dispatch: (descriptor) => {
      if (!orchestrator) {
        return Promise.reject(new Error('orchestrator is not ready'));
      }
      return orchestrator.submitDescriptor(descriptor);
    },
    defaults: config.watcher,
    logger: logger.child({ component: 'watcher' }),
  });

  orchestrator = new SyncOrchestrator({
    cloud,
    credentials,
    library,
    tracker,
    downloadDir: () => watcher.downloadDir(),
    maxFetchRetries: config.fetchMaxRetries,
    logger: logger.child({ component: 'orchestrator' }),
  });
  const sync = orchestrator;

  await scheduler.add({
    name: RECONCILE_TASK,
    intervalMs: config.reconcileIntervalMs,
    runImmediately: true,
    run: async () => {
      await sync.reconcile();
    },
  });
  await scheduler.add({
    name: TOKEN_CHECK_TASK,
    intervalMs: config.tokenCheckIntervalMs,
    run: () => credentials.checkToken(),
  });

  return {
    config,
    logger,
    startedAt: Date.now(),
    tokens,
    credentials,
    cloud,
    deviceLogin,
    library,
    tracker,
    orchestrator: sync,
    watcher,
    scheduler,
  };
}

/**
 * Bring the background work up: stored watcher settings, then the periodic tasks
 */
export async function startContext(context: AppContext): Promise<void> {
  await context.watcher.restore();
  context.scheduler.startAll();
}

export async function stopContext(context: AppContext): Promise<void> {
  context.deviceLogin.cancel();
  await context.deviceLogin.settled();
  await context.scheduler.stopAll();
  await context.orchestrator.stop();
}
