/**
 * Device Login
 *
 * Drives the OAuth2 device authorization flow: asks the cloud store for a
 * user code, then polls in the background until the user approves,
 * the code expires or the login is cancelled. One login at a time.
 */

import { isRetryable, type ClientResult, type DeviceAuthSession } from '@seedsync/core';
import {
  createLogger,
  isAbortError,
  sleep as defaultSleep,
  systemClock,
  type Clock,
  type Logger,
} from '@seedsync/utils';
import type { CloudStore } from '../clients/cloudStore.js';
import type { CredentialManager } from './credentialManager.js';

export type LoginState = 'idle' | 'pending' | 'authenticated' | 'expired' | 'failed' | 'cancelled';

export interface LoginStatus {
  state: LoginState;
  userCode?: string;
  verificationUri?: string;
  expiresAt?: number;
  error?: string;
}

export interface DeviceLoginOptions {
  cloud: Pick<CloudStore, 'startDeviceAuth' | 'pollDeviceAuth'>;
  credentials: Pick<CredentialManager, 'setCredential'>;
  clock?: Clock;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  /** Overall limit, on top of the device code's own expiry */
  timeoutMs?: number;
  maxIntervalMs?: number;
  logger?: Logger;
}

export class DeviceLogin {
  private readonly cloud: DeviceLoginOptions['cloud'];
  private readonly credentials: DeviceLoginOptions['credentials'];
  private readonly clock: Clock;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly timeoutMs: number;
  private readonly maxIntervalMs: number;
  private readonly logger: Logger;

  private status: LoginStatus = { state: 'idle' };
  private controller: AbortController | null = null;
  private polling: Promise<void> | null = null;

  constructor(options: DeviceLoginOptions) {
    this.cloud = options.cloud;
    this.credentials = options.credentials;
    this.clock = options.clock ?? systemClock;
    this.sleep = options.sleep ?? defaultSleep;
    this.timeoutMs = options.timeoutMs ?? 5 * 60 * 1000;
    this.maxIntervalMs = options.maxIntervalMs ?? 60_000;
    this.logger = options.logger ?? createLogger({ component: 'device-login' });
  }

  getStatus(): LoginStatus {
    return { ...this.status };
  }

  /**
   * Begin a new login, cancelling any login still in progress
   */
  async start(): Promise<ClientResult<DeviceAuthSession>> {
    this.cancel();

    const session = await this.cloud.startDeviceAuth();
    if (!session.ok) {
      this.status = { state: 'failed', error: session.error.message };
      return session;
    }

    const controller = new AbortController();
    this.controller = controller;
    this.status = {
      state: 'pending',
      userCode: session.value.userCode,
      verificationUri: session.value.verificationUri,
      expiresAt: session.value.expiresAt,
    };
    this.logger.info(
      { userCode: session.value.userCode, verificationUri: session.value.verificationUri },
      'Waiting for device authorization'
    );

    this.polling = this.poll(session.value, controller.signal).catch((error: unknown) => {
      this.logger.error({ err: error }, 'Device login failed');
      this.settle(controller, { state: 'failed', error: error instanceof Error ? error.message : String(error) });
    });
    return session;
  }

  /**
   * Stop polling. A pending login becomes cancelled.
   */
  cancel(): void {
    if (this.controller) {
      this.controller.abort();
      this.controller = null;
      if (this.status.state === 'pending') {
        this.status = { state: 'cancelled' };
      }
    }
  }

  /**
   * Resolves once the current polling loop has ended
   */
  async settled(): Promise<void> {
    await this.polling;
  }

  private async poll(session: DeviceAuthSession, signal: AbortSignal): Promise<void> {
    const deadline = Math.min(session.expiresAt, this.clock.now() + this.timeoutMs);
    let interval = session.intervalMs;

    while (!signal.aborted) {
      if (this.clock.now() >= deadline) {
        this.logger.warn('Device code expired before authorization');
        this.settleFor(signal, { state: 'expired' });
        return;
      }

      try {
        await this.sleep(interval, signal);
      } catch (error) {
        if (isAbortError(error) || signal.aborted) {
          return;
        }
        throw error;
      }

      const result = await this.cloud.pollDeviceAuth(session);
      if (signal.aborted) {
        return;
      }

      if (!result.ok) {
        if (isRetryable(result.error)) {
          this.logger.debug({ reason: result.error.message }, 'Device poll failed, will retry');
          continue;
        }
        this.settleFor(signal, { state: 'failed', error: result.error.message });
        return;
      }

      const outcome = result.value;
      if (outcome.state === 'pending') {
        if (outcome.slowDown) {
          interval = Math.min(interval * 2, this.maxIntervalMs);
        }
        continue;
      }
      if (outcome.state === 'expired') {
        this.settleFor(signal, { state: 'expired' });
        return;
      }

      await this.credentials.setCredential(outcome.credential);
      this.logger.info('Device authorized, credential stored');
      this.settleFor(signal, { state: 'authenticated' });
      return;
    }
  }

  private settleFor(signal: AbortSignal, status: LoginStatus): void {
    if (this.controller?.signal === signal) {
      this.controller = null;
      this.status = status;
    }
  }

  private settle(controller: AbortController, status: LoginStatus): void {
    this.settleFor(controller.signal, status);
  }
}
