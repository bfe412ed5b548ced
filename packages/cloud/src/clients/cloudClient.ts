/**
 * Cloud Store Client
 *
 * REST client for the cloud torrent-fetching service (Seedr-compatible v0.1 API).
 *
 * Features:
 * - OAuth2 device authorization and refresh-token grants
 * - Transfer submission via magnet, URL or .torrent upload
 * - Status polling with normalised states and fractional progress
 * - File listing, folder archives and streaming retrieval
 * - Pause/resume/delete operations
 */

import { FormData } from 'undici';
import {
  HttpClient,
  err,
  ok,
  type ClientResult,
  type CloudFile,
  type CloudTransfer,
  type CloudTransferStatus,
  type Credential,
  type DeviceAuthSession,
  type DevicePollOutcome,
  type HttpClientOptions,
  type RawResponse,
} from '@seedsync/core';
import { createLogger, isObject, sleep as defaultSleep, systemClock, type Clock, type Logger } from '@seedsync/utils';
import {
  accountSchema,
  archiveInitSchema,
  archiveStatusSchema,
  contentsSchema,
  deviceCodeSchema,
  fileUrlSchema,
  oauthErrorSchema,
  submitResponseSchema,
  taskListSchema,
  tokenSchema,
  type ContentItem,
} from '../schemas.js';
import type { CloudAccount, CloudStore, Submission, SubmitReceipt } from './cloudStore.js';

export const DEFAULT_CLOUD_BASE_URL = 'https://v2.seedr.cc';
export const DEFAULT_CLOUD_SCOPE =
  'files.read profile files.write files.delete files.list tasks.write tasks.read';

const DEVICE_CODE_GRANT = 'urn:ietf:params:oauth:grant-type:device_code';
const WISHLIST_REASON = 'not_enough_space_added_to_wishlist';

export interface CloudClientConfig {
  /** Scheme and host, without the API path */
  baseUrl: string;
  clientId: string;
  scope: string;
  /** Polls of a folder archive before giving up */
  archivePollAttempts: number;
  archivePollIntervalMs: number;
}

export interface CloudClientOptions extends Partial<CloudClientConfig> {
  http?: Omit<HttpClientOptions, 'service' | 'logger'>;
  clock?: Clock;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

const STATUS_MAP: Record<string, CloudTransferStatus> = {
  queued: 'queued',
  pending: 'queued',
  waiting: 'queued',
  wishlist: 'queued',
  downloading: 'downloading',
  fetching: 'downloading',
  connecting: 'downloading',
  active: 'downloading',
  paused: 'paused',
  stopped: 'paused',
  completed: 'completed',
  finished: 'completed',
  done: 'completed',
  seeding: 'completed',
  error: 'error',
  failed: 'error',
};

/**
 * Map a cloud status string onto the states the tracker understands.
 * Unknown states read as queued so the transfer keeps being polled.
 */
export function normalizeStatus(status: string | null | undefined): CloudTransferStatus {
  return STATUS_MAP[(status ?? '').trim().toLowerCase()] ?? 'queued';
}

/**
 * Progress arrives as a percentage (0-100); return it as a fraction in [0, 1]
 */
export function normalizeProgress(progress: number | null | undefined): number {
  if (progress === null || progress === undefined || !Number.isFinite(progress) || progress <= 0) {
    return 0;
  }
  return Math.min(1, progress / 100);
}

export class CloudClient implements CloudStore {
  private readonly config: CloudClientConfig;
  private readonly http: HttpClient;
  private readonly clock: Clock;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: Logger;

  constructor(options: CloudClientOptions = {}) {
    this.config = {
      baseUrl: (options.baseUrl ?? DEFAULT_CLOUD_BASE_URL).replace(/\/+$/, ''),
      clientId: options.clientId ?? '',
      scope: options.scope ?? DEFAULT_CLOUD_SCOPE,
      archivePollAttempts: options.archivePollAttempts ?? 10,
      archivePollIntervalMs: options.archivePollIntervalMs ?? 3000,
    };
    this.logger = options.logger ?? createLogger({ component: 'cloud-client' });
    this.http = new HttpClient({ ...options.http, service: 'cloud store', logger: this.logger });
    this.clock = options.clock ?? systemClock;
    this.sleep = options.sleep ?? ((ms) => defaultSleep(ms));
  }

  private get apiUrl(): string {
    return `${this.config.baseUrl}/api/v0.1/p`;
  }

  private headers(credential: Credential): Record<string, string> {
    return {
      Authorization: `Bearer ${credential.accessToken}`,
      Accept: 'application/json',
    };
  }

  private form(fields: Record<string, string>): { headers: Record<string, string>; body: string } {
    return {
      headers: {
        'Content-Type': 'application/x-www-form-urlencoded',
        Accept: 'application/json',
      },
      body: new URLSearchParams(fields).toString(),
    };
  }

  // ===========================================================================
  // Authentication
  // ===========================================================================

  async startDeviceAuth(): Promise<ClientResult<DeviceAuthSession>> {
    if (!this.config.clientId) {
      return err('Permanent', 'cloud client id is not configured');
    }

    const result = await this.http.withRetry('device-code', () =>
      this.http.json(
        {
          method: 'POST',
          url: `${this.apiUrl}/oauth/device/code`,
          ...this.form({ client_id: this.config.clientId, scope: this.config.scope }),
        },
        deviceCodeSchema
      )
    );
    if (!result.ok) {
      return result;
    }

    const data = result.value;
    return ok({
      deviceCode: data.device_code,
      userCode: data.user_code,
      verificationUri: data.verification_uri ?? data.verification_url ?? '',
      intervalMs: data.interval * 1000,
      expiresAt: this.clock.now() + data.expires_in * 1000,
    });
  }

  async pollDeviceAuth(session: DeviceAuthSession): Promise<ClientResult<DevicePollOutcome>> {
    if (this.clock.now() >= session.expiresAt) {
      return ok({ state: 'expired' });
    }

    const result = await this.http.withRetry('device-token', () =>
      this.http.raw({
        method: 'POST',
        url: `${this.apiUrl}/oauth/token`,
        ...this.form({
          grant_type: DEVICE_CODE_GRANT,
          device_code: session.deviceCode,
          client_id: this.config.clientId,
        }),
      })
    );
    if (!result.ok) {
      return result;
    }

    const response = result.value;
    if (response.statusCode === 429 || response.statusCode >= 500) {
      return this.http.failure(response);
    }

    // The token endpoint reports pending states as OAuth errors, sometimes with a 200
    const oauthError = oauthErrorSchema.safeParse(response.data);
    if (oauthError.success) {
      switch (oauthError.data.error) {
        case 'authorization_pending':
          return ok({ state: 'pending', slowDown: false });
        case 'slow_down':
          return ok({ state: 'pending', slowDown: true });
        case 'expired_token':
          return ok({ state: 'expired' });
        case 'access_denied':
          return err('Permanent', 'authorization was denied', { statusCode: response.statusCode });
        default:
          return err('Permanent', oauthError.data.error_description ?? oauthError.data.error, {
            statusCode: response.statusCode,
          });
      }
    }

    if (response.statusCode >= 400) {
      return this.http.failure(response);
    }

    const token = this.http.parse(tokenSchema, response.data);
    if (!token.ok) {
      return token;
    }
    return ok({
      state: 'authorized',
      credential: {
        accessToken: token.value.access_token,
        refreshToken: token.value.refresh_token ?? null,
        expiresAt: this.clock.now() + token.value.expires_in * 1000,
      },
    });
  }

  async refresh(credential: Credential): Promise<ClientResult<Credential>> {
    if (!credential.refreshToken) {
      return err('Unauthenticated', 'no refresh token available');
    }
    const refreshToken = credential.refreshToken;

    const result = await this.http.withRetry('refresh', () =>
      this.http.raw({
        method: 'POST',
        url: `${this.apiUrl}/oauth/token`,
        ...this.form({
          grant_type: 'refresh_token',
          refresh_token: refreshToken,
          client_id: this.config.clientId,
        }),
      })
    );
    if (!result.ok) {
      return result;
    }

    const response = result.value;
    if (response.statusCode >= 400) {
      const failure = this.http.failure<Credential>(response);
      // Any client-side rejection means the refresh token is no longer good
      if (!failure.ok && failure.error.kind === 'Permanent') {
        return err('Unauthenticated', `refresh token rejected: ${failure.error.message}`, {
          statusCode: response.statusCode,
        });
      }
      return failure;
    }

    const token = this.http.parse(tokenSchema, response.data);
    if (!token.ok) {
      return token;
    }
    return ok({
      accessToken: token.value.access_token,
      refreshToken: token.value.refresh_token ?? refreshToken,
      expiresAt: this.clock.now() + token.value.expires_in * 1000,
    });
  }

  // ===========================================================================
  // Transfers
  // ===========================================================================

  /**
   * Submit a torrent. Not retried: a timed-out submission may have been accepted.
   */
  async submit(submission: Submission, credential: Credential): Promise<ClientResult<SubmitReceipt>> {
    const url = `${this.apiUrl}/tasks`;
    let result: ClientResult<RawResponse>;

    if (submission.kind === 'torrent') {
      const form = new FormData();
      form.append('torrent_file', new Blob([new Uint8Array(submission.content)]), submission.fileName);
      result = await this.http.raw({ method: 'POST', url, headers: this.headers(credential), body: form });
    } else {
      const payload = submission.kind === 'magnet' ? { magnet: submission.uri } : { url: submission.url };
      result = await this.http.raw({
        method: 'POST',
        url,
        headers: { ...this.headers(credential), 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
      });
    }

    if (!result.ok) {
      return result;
    }
    return this.readReceipt(result.value);
  }

  /**
   * Find the cloud id in a submission response.
   * The store may answer with an error status and still have parked the torrent.
   */
  private readReceipt(response: RawResponse): ClientResult<SubmitReceipt> {
    const parsed = isObject(response.data) ? submitResponseSchema.safeParse(response.data) : null;
    const body = parsed?.success ? parsed.data : null;

    if (body?.reason_phrase === WISHLIST_REASON && body.wt?.id) {
      this.logger.warn({ cloudId: body.wt.id }, 'Cloud store is full, torrent added to wishlist');
      return ok({ cloudId: body.wt.id, wishlisted: true });
    }

    if (response.statusCode >= 400) {
      return this.http.failure(response);
    }

    const cloudId = body?.task_id ?? body?.id ?? body?.user_torrent_id;
    if (cloudId) {
      return ok({ cloudId, wishlisted: false });
    }
    if (body?.success && body.torrent_hash) {
      return ok({ cloudId: body.torrent_hash, wishlisted: false });
    }

    return err('Permanent', body?.message ?? 'cloud store did not return a transfer id', {
      statusCode: response.statusCode,
    });
  }

  async listTransfers(credential: Credential): Promise<ClientResult<CloudTransfer[]>> {
    const result = await this.http.withRetry('list-transfers', () =>
      this.http.json({ method: 'GET', url: `${this.apiUrl}/tasks`, headers: this.headers(credential) }, taskListSchema)
    );
    if (!result.ok) {
      return result;
    }

    return ok(
      result.value.map((task) => ({
        id: task.id,
        title: task.name ?? task.title ?? task.id,
        status: normalizeStatus(task.status),
        progress: normalizeProgress(task.progress),
        sizeBytes: task.size ?? undefined,
        message: task.message ?? undefined,
      }))
    );
  }

  async listFiles(cloudId: string, credential: Credential): Promise<ClientResult<CloudFile[]>> {
    const contents = await this.http.withRetry('list-files', () =>
      this.http.json(
        {
          method: 'GET',
          url: `${this.apiUrl}/tasks/${encodeURIComponent(cloudId)}/contents`,
          headers: this.headers(credential),
        },
        contentsSchema
      )
    );
    if (!contents.ok) {
      return contents;
    }

    const files: CloudFile[] = [];
    for (const item of contents.value) {
      const resolved =
        item.type === 'folder'
          ? await this.archiveFolder(item, credential)
          : await this.resolveFile(item, credential);
      if (!resolved.ok) {
        return resolved;
      }
      files.push(resolved.value);
    }
    return ok(files);
  }

  private async resolveFile(item: ContentItem, credential: Credential): Promise<ClientResult<CloudFile>> {
    if (item.url) {
      return ok({ name: item.name, sizeBytes: item.size ?? 0, downloadUrl: item.url });
    }

    const result = await this.http.withRetry('file-url', () =>
      this.http.json(
        {
          method: 'GET',
          url: `${this.apiUrl}/file/${encodeURIComponent(item.id)}`,
          headers: this.headers(credential),
        },
        fileUrlSchema
      )
    );
    if (!result.ok) {
      return result;
    }
    return ok({ name: item.name, sizeBytes: item.size ?? 0, downloadUrl: result.value.url });
  }

  /**
   * Folders are retrieved as a zip built on demand by the store
   */
  private async archiveFolder(item: ContentItem, credential: Credential): Promise<ClientResult<CloudFile>> {
    const init = await this.http.withRetry('archive-init', () =>
      this.http.json(
        {
          method: 'POST',
          url: `${this.apiUrl}/folder/${encodeURIComponent(item.id)}/archive`,
          headers: this.headers(credential),
        },
        archiveInitSchema
      )
    );
    if (!init.ok) {
      return init;
    }
    const uniq = init.value.uniq;

    for (let attempt = 1; attempt <= this.config.archivePollAttempts; attempt++) {
      const status = await this.http.withRetry('archive-status', () =>
        this.http.json(
          {
            method: 'GET',
            url: `${this.apiUrl}/folder/archive/${encodeURIComponent(uniq)}`,
            headers: this.headers(credential),
          },
          archiveStatusSchema
        )
      );
      if (!status.ok) {
        return status;
      }
      if (status.value.status === 'ready' && status.value.url) {
        return ok({ name: `${item.name}.zip`, sizeBytes: item.size ?? 0, downloadUrl: status.value.url });
      }

      this.logger.debug({ folder: item.name, attempt, progress: status.value.progress }, 'Archive still generating');
      if (attempt < this.config.archivePollAttempts) {
        await this.sleep(this.config.archivePollIntervalMs);
      }
    }

    return err('Transient', `archive of ${item.name} was not ready in time`);
  }

  /**
   * Stream a file to disk. The bearer token only goes to the API host.
   */
  async fetch(
    downloadUrl: string,
    destination: string,
    credential: Credential,
    signal?: AbortSignal
  ): Promise<ClientResult<number>> {
    const headers = this.isApiHost(downloadUrl) ? this.headers(credential) : {};
    return this.http.download({ url: downloadUrl, headers, signal }, destination);
  }

  private isApiHost(url: string): boolean {
    try {
      return new URL(url).host === new URL(this.config.baseUrl).host;
    } catch {
      return false;
    }
  }

  async pause(cloudId: string, credential: Credential): Promise<ClientResult<void>> {
    return this.taskAction('pause', cloudId, credential);
  }

  async resume(cloudId: string, credential: Credential): Promise<ClientResult<void>> {
    return this.taskAction('resume', cloudId, credential);
  }

  private async taskAction(
    action: 'pause' | 'resume',
    cloudId: string,
    credential: Credential
  ): Promise<ClientResult<void>> {
    return this.http.withRetry(action, () =>
      this.http.send({
        method: 'POST',
        url: `${this.apiUrl}/tasks/${encodeURIComponent(cloudId)}/${action}`,
        headers: this.headers(credential),
      })
    );
  }

  async delete(cloudId: string, credential: Credential): Promise<ClientResult<void>> {
    return this.http.withRetry('delete', () =>
      this.http.send({
        method: 'DELETE',
        url: `${this.apiUrl}/tasks/${encodeURIComponent(cloudId)}`,
        headers: this.headers(credential),
      })
    );
  }

  // ===========================================================================
  // Account
  // ===========================================================================

  async getAccount(credential: Credential): Promise<ClientResult<CloudAccount>> {
    const result = await this.http.withRetry('account', () =>
      this.http.json({ method: 'GET', url: `${this.apiUrl}/user`, headers: this.headers(credential) }, accountSchema)
    );
    if (!result.ok) {
      return result;
    }

    const account = result.value;
    return ok({
      username: account.username ?? null,
      email: account.email ?? null,
      spaceUsedBytes: account.space_used ?? null,
      spaceMaxBytes: account.space_max ?? null,
      premium: Boolean(account.is_premium),
    });
  }
}
