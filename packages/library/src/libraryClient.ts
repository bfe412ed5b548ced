/**
 * Library Manager Client
 *
 * Talks to a Sonarr-compatible v3 REST API with an X-Api-Key header.
 * Without a host and an API key every call succeeds without doing anything.
 * Failures come back as results, never thrown.
 */

import { HttpClient, ok, type ClientResult, type HttpClientOptions } from '@seedsync/core';
import { createLogger, type Logger } from '@seedsync/utils';
import { commandSchema, rootFolderListSchema, seriesListSchema, seriesSchema } from './schemas.js';

export const DEFAULT_LIBRARY_HOST = 'http://localhost:8989';

export interface LibraryClientConfig {
  host: string;
  apiKey: string;
}

export interface LibraryClientOptions extends Partial<LibraryClientConfig> {
  http?: Omit<HttpClientOptions, 'service' | 'logger'>;
  logger?: Logger;
}

export interface Series {
  id: number;
  title: string;
  path: string | null;
  year: number | null;
}

export interface RootFolder {
  id: number;
  path: string;
  freeSpaceBytes: number | null;
  accessible: boolean;
}

export type ImportTrigger =
  | { skipped: false; commandId: number; status: string }
  | { skipped: true };

export class LibraryClient {
  private readonly config: LibraryClientConfig;
  private readonly http: HttpClient;
  private readonly logger: Logger;

  constructor(options: LibraryClientOptions = {}) {
    this.config = {
      host: (options.host ?? DEFAULT_LIBRARY_HOST).replace(/\/+$/, ''),
      apiKey: options.apiKey ?? '',
    };
    this.logger = options.logger ?? createLogger({ component: 'library-client' });
    this.http = new HttpClient({ ...options.http, service: 'library manager', logger: this.logger });
  }

  /**
   * Both a host and an API key are required to talk to the library manager
   */
  get isConfigured(): boolean {
    return this.config.host.length > 0 && this.config.apiKey.length > 0;
  }

  get host(): string {
    return this.config.host;
  }

  private headers(): Record<string, string> {
    return {
      'X-Api-Key': this.config.apiKey,
      'Content-Type': 'application/json',
      Accept: 'application/json',
    };
  }

  async listSeries(): Promise<ClientResult<Series[]>> {
    if (!this.isConfigured) {
      return ok([]);
    }

    const result = await this.http.withRetry('list-series', () =>
      this.http.json({ method: 'GET', url: `${this.config.host}/api/v3/series`, headers: this.headers() }, seriesListSchema)
    );
    if (!result.ok) {
      return result;
    }
    return ok(result.value.map(toSeries));
  }

  async getSeries(seriesId: number): Promise<ClientResult<Series | null>> {
    if (!this.isConfigured) {
      return ok(null);
    }

    const result = await this.http.withRetry('get-series', () =>
      this.http.json(
        { method: 'GET', url: `${this.config.host}/api/v3/series/${seriesId}`, headers: this.headers() },
        seriesSchema
      )
    );
    if (!result.ok) {
      return result.error.kind === 'NotFound' ? ok(null) : result;
    }
    return ok(toSeries(result.value));
  }

  async listRootFolders(): Promise<ClientResult<RootFolder[]>> {
    if (!this.isConfigured) {
      return ok([]);
    }

    const result = await this.http.withRetry('list-root-folders', () =>
      this.http.json(
        { method: 'GET', url: `${this.config.host}/api/v3/rootfolder`, headers: this.headers() },
        rootFolderListSchema
      )
    );
    if (!result.ok) {
      return result;
    }
    return ok(
      result.value.map((folder) => ({
        id: folder.id,
        path: folder.path,
        freeSpaceBytes: folder.freeSpace ?? null,
        accessible: folder.accessible ?? true,
      }))
    );
  }

  /**
   * Ask the library manager to scan a directory of finished downloads
   */
  async triggerImport(path: string): Promise<ClientResult<ImportTrigger>> {
    if (!this.isConfigured) {
      this.logger.debug({ path }, 'Library manager not configured, skipping import');
      return ok({ skipped: true });
    }

    const result = await this.http.withRetry('trigger-import', () =>
      this.http.json(
        {
          method: 'POST',
          url: `${this.config.host}/api/v3/command`,
          headers: this.headers(),
          body: JSON.stringify({ name: 'DownloadedEpisodesScan', path }),
        },
        commandSchema
      )
    );
    if (!result.ok) {
      this.logger.warn({ path, kind: result.error.kind, reason: result.error.message }, 'Import request failed');
      return result;
    }

    this.logger.info({ path, commandId: result.value.id }, 'Import requested');
    return ok({ skipped: false, commandId: result.value.id, status: result.value.status });
  }
}

function toSeries(series: { id: number; title: string; path?: string; year?: number }): Series {
  return {
    id: series.id,
    title: series.title,
    path: series.path ?? null,
    year: series.year ?? null,
  };
}
