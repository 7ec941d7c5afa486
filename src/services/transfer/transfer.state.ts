import { ApiError } from '../../middlewares/errorHandler';

export enum TransferStatus {
  REQUESTED = 'REQUESTED',
  VALIDATED = 'VALIDATED',
  COMMITTED = 'COMMITTED',
  REJECTED = 'REJECTED',
  ABORTED = 'ABORTED',
}

/**
 * Valid state transitions for one transfer unit
 *
 * State Machine:
 * REQUESTED ────► VALIDATED ────► COMMITTED
 *     │               │
 *     │ (validation   │ (rollback after validation)
 *     │  fails)       ▼
 *     ▼            ABORTED
 *  REJECTED
 */
const validTransitions: Record<TransferStatus, TransferStatus[]> = {
  [TransferStatus.REQUESTED]: [TransferStatus.VALIDATED, TransferStatus.REJECTED],
  [TransferStatus.VALIDATED]: [TransferStatus.COMMITTED, TransferStatus.ABORTED],
  [TransferStatus.COMMITTED]: [], // Terminal state
  [TransferStatus.REJECTED]: [], // Terminal state
  [TransferStatus.ABORTED]: [], // Terminal state
};

/**
 * Check if a state transition is valid
 */
export function isValidTransition(
  currentStatus: TransferStatus,
  newStatus: TransferStatus
): boolean {
  return validTransitions[currentStatus].includes(newStatus);
}

/**
 * Validate a state transition
 * Throws an internal ApiError if the transition is invalid
 */
export function validateTransition(
  currentStatus: TransferStatus,
  newStatus: TransferStatus,
  transferRef: string
): void {
  if (!isValidTransition(currentStatus, newStatus)) {
    throw ApiError.internal(
      `Invalid state transition from ${currentStatus} to ${newStatus} for transfer ${transferRef}`
    );
  }
}

export function isTerminalState(status: TransferStatus): boolean {
  return validTransitions[status].length === 0;
}

export function getAllowedTransitions(status: TransferStatus): TransferStatus[] {
  return validTransitions[status];
}
