/**
 * Finite state machine for a batching run.
 *
 * Valid transitions:
 * - `CREATED` → `RUNNING` | `CLOSED`
 * - `RUNNING` → `COMPLETED` | `FAILED` | `CLOSED`
 * - `COMPLETED`, `FAILED`, `CLOSED` → (terminal)
 */
export const BatcherStatus = {
  CREATED: 'CREATED',
  RUNNING: 'RUNNING',
  COMPLETED: 'COMPLETED',
  FAILED: 'FAILED',
  CLOSED: 'CLOSED',
} as const;

export type BatcherStatus = (typeof BatcherStatus)[keyof typeof BatcherStatus];

const VALID_TRANSITIONS: Record<BatcherStatus, readonly BatcherStatus[]> = {
  [BatcherStatus.CREATED]: [BatcherStatus.RUNNING, BatcherStatus.CLOSED],
  [BatcherStatus.RUNNING]: [BatcherStatus.COMPLETED, BatcherStatus.FAILED, BatcherStatus.CLOSED],
  [BatcherStatus.COMPLETED]: [],
  [BatcherStatus.FAILED]: [],
  [BatcherStatus.CLOSED]: [],
};

/** Check whether a state transition is valid according to the run lifecycle FSM. */
export function canTransition(from: BatcherStatus, to: BatcherStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

/** `true` once the run can produce no further batches. */
export function isTerminal(status: BatcherStatus): boolean {
  return VALID_TRANSITIONS[status].length === 0;
}
