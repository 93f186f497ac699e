import { describe, expect, it } from 'vitest';
import { describeSyncFailure, failed, succeeded } from './outcome';

describe('sync/outcome', () => {
  it('describes each failure with the names involved', () => {
    expect(describeSyncFailure({ kind: 'controller-detached' })).toBe(
      'controller is detached'
    );
    expect(describeSyncFailure({ kind: 'aborted' })).toBe(
      'aborted by the caller'
    );
    expect(
      describeSyncFailure({ kind: 'view-unavailable', timeoutMs: 500 })
    ).toBe('no view attached within 500ms');
    expect(
      describeSyncFailure({
        kind: 'state-machine-not-found',
        stateMachineName: 'SM',
        inputName: 'Go',
        timeoutMs: 200,
      })
    ).toBe('state machine "SM" not found within 200ms (input "Go")');
    expect(
      describeSyncFailure({
        kind: 'input-not-found',
        stateMachineName: 'SM',
        inputName: 'Missing',
      })
    ).toBe('input "Missing" not found on state machine "SM"');
    expect(
      describeSyncFailure({
        kind: 'input-kind-mismatch',
        stateMachineName: 'SM',
        inputName: 'Flag',
        expected: 'trigger',
        actual: 'boolean',
      })
    ).toBe(
      'input "Flag" on state machine "SM" is a boolean input, expected trigger'
    );
  });

  it('wraps values and failures', () => {
    expect(succeeded(true)).toEqual({ ok: true, value: true });
    expect(failed({ kind: 'aborted' })).toEqual({
      ok: false,
      failure: { kind: 'aborted' },
    });
  });
});
