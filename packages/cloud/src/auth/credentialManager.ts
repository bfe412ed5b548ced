/**
 * Credential Manager
 *
 * Owns the live credential: caches it, refreshes it before it expires
 * and retries a call once when the cloud store rejects the token.
 * Concurrent callers share a single in-flight refresh.
 */

import { err, ok, type ClientResult, type Credential } from '@seedsync/core';
import { createLogger, systemClock, type Clock, type Logger } from '@seedsync/utils';
import type { CloudStore } from '../clients/cloudStore.js';
import type { TokenStore } from './tokenStore.js';

export interface CredentialManagerOptions {
  store: TokenStore;
  cloud: Pick<CloudStore, 'refresh'>;
  clock?: Clock;
  logger?: Logger;
}

export class CredentialManager {
  private readonly store: TokenStore;
  private readonly cloud: Pick<CloudStore, 'refresh'>;
  private readonly clock: Clock;
  private readonly logger: Logger;

  /** undefined until the store has been read */
  private cached: Credential | null | undefined;
  private loading: Promise<Credential | null> | null = null;
  private refreshing: Promise<ClientResult<Credential>> | null = null;
  /** Bumped by every login and logout; a refresh started under an older one is dropped */
  private generation = 0;

  constructor(options: CredentialManagerOptions) {
    this.store = options.store;
    this.cloud = options.cloud;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createLogger({ component: 'credentials' });
  }

  private async current(): Promise<Credential | null> {
    if (this.cached !== undefined) {
      return this.cached;
    }
    if (!this.loading) {
      this.loading = this.store.load();
    }
    const loaded = await this.loading;
    // A login or refresh may have landed while the file was read
    if (this.cached === undefined) {
      this.cached = loaded;
    }
    return this.cached;
  }

  /**
   * A credential good for at least the safety margin, refreshing first if needed
   */
  async getCredential(): Promise<ClientResult<Credential>> {
    const credential = await this.current();
    if (!credential) {
      return err('Unauthenticated', 'not logged in to the cloud store');
    }
    if (this.store.isValid(credential, this.clock.now())) {
      return ok(credential);
    }
    return this.refresh();
  }

  /**
   * Refresh now. Joins the refresh already in flight, if any.
   */
  refresh(): Promise<ClientResult<Credential>> {
    if (!this.refreshing) {
      this.refreshing = this.runRefresh().finally(() => {
        this.refreshing = null;
      });
    }
    return this.refreshing;
  }

  private async runRefresh(): Promise<ClientResult<Credential>> {
    const generation = this.generation;
    const credential = await this.current();
    if (!credential) {
      return err('Unauthenticated', 'not logged in to the cloud store');
    }

    const result = await this.cloud.refresh(credential);
    if (generation !== this.generation) {
      this.logger.info('Credential changed during refresh, discarding refreshed token');
      return err('Unauthenticated', 'credential changed during refresh');
    }
    if (!result.ok) {
      if (result.error.kind === 'Unauthenticated') {
        this.logger.warn({ reason: result.error.message }, 'Refresh token rejected, login required');
        await this.clearQuietly();
      } else {
        this.logger.warn({ kind: result.error.kind, reason: result.error.message }, 'Token refresh failed');
      }
      return result;
    }

    this.cached = result.value;
    try {
      await this.store.save(result.value);
    } catch (error) {
      // The new token stays usable in memory until the next save succeeds
      this.logger.error({ err: error }, 'Cannot persist refreshed credential');
    }
    this.logger.info({ expiresAt: new Date(result.value.expiresAt).toISOString() }, 'Access token refreshed');
    return ok(result.value);
  }

  /**
   * Run a cloud call with a fresh credential; on Unauthenticated refresh once and retry
   */
  async withCredential<T>(fn: (credential: Credential) => Promise<ClientResult<T>>): Promise<ClientResult<T>> {
    const credential = await this.getCredential();
    if (!credential.ok) {
      return credential;
    }

    const result = await fn(credential.value);
    if (result.ok || result.error.kind !== 'Unauthenticated') {
      return result;
    }

    this.logger.debug('Cloud store rejected the token, refreshing');
    const refreshed = await this.refresh();
    if (!refreshed.ok) {
      return refreshed;
    }
    return fn(refreshed.value);
  }

  /**
   * Store a new credential. Throws LocalIOError when it cannot be persisted.
   */
  async setCredential(credential: Credential): Promise<void> {
    this.generation++;
    this.cached = credential;
    await this.store.save(credential);
  }

  async clear(): Promise<void> {
    this.generation++;
    this.cached = null;
    await this.store.clear();
  }

  private async clearQuietly(): Promise<void> {
    try {
      await this.clear();
    } catch (error) {
      this.logger.error({ err: error }, 'Cannot remove stored credential');
    }
  }

  /**
   * Logged in with a token that is still valid or can be refreshed
   */
  async isAuthenticated(): Promise<boolean> {
    const credential = await this.current();
    if (!credential) {
      return false;
    }
    return this.store.isValid(credential, this.clock.now()) || credential.refreshToken !== null;
  }

  /**
   * Periodic check: refresh ahead of expiry, do nothing when logged out
   */
  async checkToken(): Promise<void> {
    const credential = await this.current();
    if (!credential || this.store.isValid(credential, this.clock.now())) {
      return;
    }
    await this.refresh();
  }
}
