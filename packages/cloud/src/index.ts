/**
 * @seedsync/cloud
 *
 * Cloud store integration:
 * - REST client and its contract
 * - Credential persistence and refresh
 * - OAuth2 device login
 */

export {
  CloudClient,
  DEFAULT_CLOUD_BASE_URL,
  DEFAULT_CLOUD_SCOPE,
  normalizeStatus,
  normalizeProgress,
  type CloudClientConfig,
  type CloudClientOptions,
} from './clients/cloudClient.js';

export type {
  CloudStore,
  CloudAccount,
  Submission,
  SubmitReceipt,
} from './clients/cloudStore.js';

export { TokenStore, DEFAULT_SAFETY_MARGIN_MS, type TokenStoreOptions } from './auth/tokenStore.js';
export { CredentialManager, type CredentialManagerOptions } from './auth/credentialManager.js';
export {
  DeviceLogin,
  type DeviceLoginOptions,
  type LoginState,
  type LoginStatus,
} from './auth/deviceLogin.js';
