/**
 * Transfer Types
 */

import type { TransferStatus } from '../stateMachine.js';

export type DescriptorKind = 'torrent' | 'magnet';

/**
 * A torrent or magnet file discovered in the watched directory
 */
export interface TorrentDescriptor {
  path: string;
  title: string;
  kind: DescriptorKind;
  discoveredAt: Date;
}

/**
 * What a transfer was created from
 */
export type TransferSource = 'watcher' | 'manual' | 'url';

/**
 * The local record of one torrent's journey from submission to import
 */
export interface Transfer {
  id: string;
  title: string;
  cloudId: string;
  status: TransferStatus;
  /** Fraction in [0, 1] */
  progress: number;
  sizeBytes?: number;
  seriesId?: number;
  /** Set while status is `error` */
  error?: string;
  /** Non-fatal problem, e.g. the library import request failed */
  notice?: string;
  retryCount: number;
  source: TransferSource;
  uploadedAt: Date;
  updatedAt: Date;
}

export interface TransferSummary {
  id: string;
  title: string;
  status: TransferStatus;
  progress: number;
  sizeBytes: number | null;
  seriesId: number | null;
  error: string | null;
  notice: string | null;
  retryCount: number;
  uploadedAt: string;
}

/**
 * Cloud-side view of a transfer, as reported by the cloud store
 */
export type CloudTransferStatus = 'queued' | 'downloading' | 'paused' | 'completed' | 'error';

export interface CloudTransfer {
  id: string;
  title: string;
  status: CloudTransferStatus;
  /** Fraction in [0, 1] */
  progress: number;
  sizeBytes?: number;
  message?: string;
}

/**
 * A retrievable file of a completed cloud transfer
 */
export interface CloudFile {
  name: string;
  sizeBytes: number;
  downloadUrl: string;
}

export function toTransferSummary(transfer: Transfer): TransferSummary {
  return {
    id: transfer.id,
    title: transfer.title,
    status: transfer.status,
    progress: transfer.progress,
    sizeBytes: transfer.sizeBytes ?? null,
    seriesId: transfer.seriesId ?? null,
    error: transfer.error ?? null,
    notice: transfer.notice ?? null,
    retryCount: transfer.retryCount,
    uploadedAt: transfer.uploadedAt.toISOString(),
  };
}
