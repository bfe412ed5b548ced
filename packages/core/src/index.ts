/**
 * @seedsync/core
 *
 * Core domain package containing:
 * - Transfer state machine
 * - Error handling
 * - Client result type
 * - Shared types
 */

// State machine
export {
  TRANSFER_STATUSES,
  isTransferStatus,
  isValidTransition,
  getNextStates,
  forwardPath,
  assertTransition,
} from './stateMachine.js';

export type {
  TransferStatus,
  TransferStateTransition,
} from './stateMachine.js';

// Result
export { ok, err, isRetryable, classifyStatus } from './result.js';
export type { ClientResult, ClientError, ClientErrorKind } from './result.js';

// Types
export type {
  Credential,
  DeviceAuthSession,
  DevicePollOutcome,
} from './types/credential.js';

export { toTransferSummary } from './types/transfer.js';
export type {
  DescriptorKind,
  TorrentDescriptor,
  TransferSource,
  Transfer,
  TransferSummary,
  CloudTransferStatus,
  CloudTransfer,
  CloudFile,
} from './types/transfer.js';

// Errors
export {
  SeedSyncError,
  ValidationError,
  StateTransitionError,
  NotFoundError,
  ConflictError,
  UpstreamError,
  LocalIOError,
} from './errors/index.js';

// HTTP
export { HttpClient } from './http/httpClient.js';
export type {
  HttpClientOptions,
  HttpRetryOptions,
  HttpCall,
  RawResponse,
  ResponseHeaders,
} from './http/httpClient.js';
