/**
 * Credential Types
 */

/**
 * OAuth2 credential for the cloud store.
 * `expiresAt` is an absolute instant in epoch milliseconds.
 */
export interface Credential {
  accessToken: string;
  refreshToken: string | null;
  expiresAt: number;
}

/**
 * In-flight OAuth2 device authorization.
 * Lives in memory only, for the duration of one login attempt.
 */
export interface DeviceAuthSession {
  deviceCode: string;
  userCode: string;
  verificationUri: string;
  intervalMs: number;
  expiresAt: number;
}

export type DevicePollOutcome =
  | { state: 'pending'; slowDown: boolean }
  | { state: 'expired' }
  | { state: 'authorized'; credential: Credential };
