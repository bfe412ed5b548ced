/**
 * Cloud Store contract
 *
 * What the orchestrator and the login flow need from the cloud
 * torrent-fetching service. CloudClient implements it over REST;
 * tests use an in-memory implementation.
 */

import type {
  ClientResult,
  CloudFile,
  CloudTransfer,
  Credential,
  DeviceAuthSession,
  DevicePollOutcome,
} from '@seedsync/core';

export type Submission =
  | { kind: 'magnet'; uri: string }
  | { kind: 'url'; url: string }
  | { kind: 'torrent'; fileName: string; content: Buffer };

export interface SubmitReceipt {
  cloudId: string;
  /** The store had no room and parked the torrent on its wishlist */
  wishlisted: boolean;
}

export interface CloudAccount {
  username: string | null;
  email: string | null;
  spaceUsedBytes: number | null;
  spaceMaxBytes: number | null;
  premium: boolean;
}

export interface CloudStore {
  startDeviceAuth(): Promise<ClientResult<DeviceAuthSession>>;
  pollDeviceAuth(session: DeviceAuthSession): Promise<ClientResult<DevicePollOutcome>>;
  refresh(credential: Credential): Promise<ClientResult<Credential>>;

  submit(submission: Submission, credential: Credential): Promise<ClientResult<SubmitReceipt>>;
  listTransfers(credential: Credential): Promise<ClientResult<CloudTransfer[]>>;
  listFiles(cloudId: string, credential: Credential): Promise<ClientResult<CloudFile[]>>;
  /** Resolves to the number of bytes written */
  fetch(
    downloadUrl: string,
    destination: string,
    credential: Credential,
    signal?: AbortSignal
  ): Promise<ClientResult<number>>;

  pause(cloudId: string, credential: Credential): Promise<ClientResult<void>>;
  resume(cloudId: string, credential: Credential): Promise<ClientResult<void>>;
  delete(cloudId: string, credential: Credential): Promise<ClientResult<void>>;

  getAccount(credential: Credential): Promise<ClientResult<CloudAccount>>;
}
