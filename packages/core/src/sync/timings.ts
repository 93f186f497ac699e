export interface SyncTimings {
  /** How long an operation waits for a view to be attached. */
  viewTimeoutMs: number;
  /** How long a state machine lookup keeps polling the attached view. */
  lookupTimeoutMs: number;
  /** Delay between two polls; 8ms is roughly one frame at 120Hz. */
  pollIntervalMs: number;
  /** Default bound for `awaitState`. */
  awaitStateTimeoutMs: number;
}

export const DEFAULT_SYNC_TIMINGS: Readonly<SyncTimings> = Object.freeze({
  viewTimeoutMs: 500,
  lookupTimeoutMs: 200,
  pollIntervalMs: 8,
  awaitStateTimeoutMs: 200,
});

const TIMING_KEYS = [
  'viewTimeoutMs',
  'lookupTimeoutMs',
  'pollIntervalMs',
  'awaitStateTimeoutMs',
] as const satisfies ReadonlyArray<keyof SyncTimings>;

export function resolveSyncTimings(
  overrides: Partial<SyncTimings> = {}
): SyncTimings {
  const timings: SyncTimings = { ...DEFAULT_SYNC_TIMINGS };
  for (const key of TIMING_KEYS) {
    const value = overrides[key];
    if (value === undefined) continue;
    if (!Number.isFinite(value) || value < 0) {
      throw new Error(
        `StateSyncController: timing "${key}" must be a finite, non-negative number (got ${value})`
      );
    }
    timings[key] = value;
  }
  if (timings.pollIntervalMs === 0) {
    throw new Error(
      'StateSyncController: timing "pollIntervalMs" must be greater than 0'
    );
  }
  return timings;
}
