/**
 * Transfer State Machine
 *
 * State Flow:
 * QUEUED → DOWNLOADING → COMPLETED → IMPORTED
 *               ↕ PAUSED
 *     ↘ ERROR (from queued, downloading, paused, completed)
 *     ↘ DELETED (from any state but deleted)
 *
 * Rules:
 * - ERROR → QUEUED is the only backward edge (retry)
 * - Invalid transitions throw errors
 */

import { StateTransitionError } from './errors/index.js';

export const TRANSFER_STATUSES = [
  'queued',
  'downloading',
  'paused',
  'completed',
  'imported',
  'error',
  'deleted',
] as const;

export type TransferStatus = (typeof TRANSFER_STATUSES)[number];

/**
 * Represents a state transition with metadata
 */
export interface TransferStateTransition {
  from: TransferStatus;
  to: TransferStatus;
  timestamp: Date;
  reason?: string;
}

/**
 * Valid state transitions
 * Maps each state to the set of states it can transition to
 */
const validTransitions: Record<TransferStatus, Set<TransferStatus>> = {
  queued: new Set<TransferStatus>(['downloading', 'error', 'deleted']),
  downloading: new Set<TransferStatus>(['paused', 'completed', 'error', 'deleted']),
  paused: new Set<TransferStatus>(['downloading', 'error', 'deleted']),
  completed: new Set<TransferStatus>([
    'imported',
    'error', // Fetch retries exhausted
    'deleted',
  ]),
  imported: new Set<TransferStatus>(['deleted']),
  error: new Set<TransferStatus>([
    'queued', // Allow retry from error
    'deleted',
  ]),
  deleted: new Set<TransferStatus>([]), // Terminal state
};

/**
 * Edges reconciliation may follow to catch up with the cloud store.
 * Failure, retry, import and deletion are never inferred from a status report.
 */
const forwardTransitions: Record<TransferStatus, TransferStatus[]> = {
  queued: ['downloading'],
  downloading: ['completed', 'paused'],
  paused: ['downloading'],
  completed: [],
  imported: [],
  error: [],
  deleted: [],
};

export function isTransferStatus(value: unknown): value is TransferStatus {
  return TRANSFER_STATUSES.some((status) => status === value);
}

/**
 * Check if a state transition is valid
 */
export function isValidTransition(from: TransferStatus, to: TransferStatus): boolean {
  return validTransitions[from].has(to);
}

/**
 * Get all valid next states from the current state
 */
export function getNextStates(current: TransferStatus): TransferStatus[] {
  return Array.from(validTransitions[current]);
}

/**
 * Shortest chain of forward steps leading from `from` to `to`, excluding `from`.
 * Returns null when `to` is not reachable moving forward.
 */
export function forwardPath(from: TransferStatus, to: TransferStatus): TransferStatus[] | null {
  if (from === to) return [];

  const previous = new Map<TransferStatus, TransferStatus>();
  const queue: TransferStatus[] = [from];

  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) break;

    for (const next of forwardTransitions[current]) {
      if (next === from || previous.has(next)) continue;
      previous.set(next, current);
      if (next === to) {
        const path: TransferStatus[] = [next];
        let step = current;
        while (step !== from) {
          path.unshift(step);
          const before = previous.get(step);
          if (before === undefined) break;
          step = before;
        }
        return path;
      }
      queue.push(next);
    }
  }

  return null;
}

/**
 * Throw unless the transition is valid
 */
export function assertTransition(
  transferId: string,
  from: TransferStatus,
  to: TransferStatus
): void {
  if (!isValidTransition(from, to)) {
    throw new StateTransitionError(transferId, from, to);
  }
}
