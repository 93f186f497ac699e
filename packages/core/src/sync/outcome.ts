import type { StateMachineInputKind } from '../types';

export type SyncOperation =
  | 'isReadyAndPlaying'
  | 'play'
  | 'fireTrigger'
  | 'setBoolean'
  | 'setNumber';

export type SyncFailure =
  | { kind: 'controller-detached' }
  | { kind: 'aborted' }
  | { kind: 'view-unavailable'; timeoutMs: number }
  | {
      kind: 'state-machine-not-found';
      stateMachineName: string;
      inputName: string;
      timeoutMs: number;
    }
  | { kind: 'input-not-found'; stateMachineName: string; inputName: string }
  | {
      kind: 'input-kind-mismatch';
      stateMachineName: string;
      inputName: string;
      expected: StateMachineInputKind;
      actual: StateMachineInputKind;
    };

export type SyncFailureKind = SyncFailure['kind'];

export type SyncOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; failure: SyncFailure };

export function succeeded<T>(value: T): SyncOutcome<T> {
  return { ok: true, value };
}

export function failed<T>(failure: SyncFailure): SyncOutcome<T> {
  return { ok: false, failure };
}

export function describeSyncFailure(failure: SyncFailure): string {
  switch (failure.kind) {
    case 'controller-detached':
      return 'controller is detached';
    case 'aborted':
      return 'aborted by the caller';
    case 'view-unavailable':
      return `no view attached within ${failure.timeoutMs}ms`;
    case 'state-machine-not-found':
      return `state machine "${failure.stateMachineName}" not found within ${failure.timeoutMs}ms (input "${failure.inputName}")`;
    case 'input-not-found':
      return `input "${failure.inputName}" not found on state machine "${failure.stateMachineName}"`;
    case 'input-kind-mismatch':
      return `input "${failure.inputName}" on state machine "${failure.stateMachineName}" is a ${failure.actual} input, expected ${failure.expected}`;
  }
}
