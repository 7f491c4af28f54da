/**
 * Finite state machine for a batch run.
 *
 * Valid transitions:
 * - `CREATED` → `PREFLIGHTING` | `FAILED`
 * - `PREFLIGHTING` → `RUNNING` | `FAILED`
 * - `RUNNING` → `DRAINING` | `FAILED`
 * - `DRAINING` → `COMPLETED` | `FAILED`
 * - `COMPLETED`, `FAILED` → (terminal)
 */
export const PipelineStatus = {
  CREATED: 'CREATED',
  PREFLIGHTING: 'PREFLIGHTING',
  RUNNING: 'RUNNING',
  DRAINING: 'DRAINING',
  COMPLETED: 'COMPLETED',
  FAILED: 'FAILED',
} as const;

export type PipelineStatus = (typeof PipelineStatus)[keyof typeof PipelineStatus];

const VALID_TRANSITIONS: Record<PipelineStatus, readonly PipelineStatus[]> = {
  [PipelineStatus.CREATED]: [PipelineStatus.PREFLIGHTING, PipelineStatus.FAILED],
  [PipelineStatus.PREFLIGHTING]: [PipelineStatus.RUNNING, PipelineStatus.FAILED],
  [PipelineStatus.RUNNING]: [PipelineStatus.DRAINING, PipelineStatus.FAILED],
  [PipelineStatus.DRAINING]: [PipelineStatus.COMPLETED, PipelineStatus.FAILED],
  [PipelineStatus.COMPLETED]: [],
  [PipelineStatus.FAILED]: [],
};

/** Check whether a state transition is valid according to the pipeline FSM. */
export function canTransition(from: PipelineStatus, to: PipelineStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

export function isTerminal(status: PipelineStatus): boolean {
  return VALID_TRANSITIONS[status].length === 0;
}
