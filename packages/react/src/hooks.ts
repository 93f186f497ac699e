import { useEffect, useRef, useState } from 'react';
import {
  StateSyncController,
  type StateChangedListener,
  type StateSyncControllerOptions,
} from '@rive-sync/core';

/**
 * Creates one {@link StateSyncController} for the lifetime of the calling
 * component. Options are only read on the first render.
 */
export function useStateController(
  options?: StateSyncControllerOptions
): StateSyncController {
  const [controller] = useState(() => new StateSyncController(options));
  return controller;
}

/**
 * Registers `listener` on `controller` for as long as the component is
 * mounted. The latest `listener` is always the one called, so it does not
 * need to be memoised.
 */
export function useStateChangedListener(
  controller: StateSyncController | null | undefined,
  listener: StateChangedListener
): void {
  const listenerRef = useRef(listener);
  listenerRef.current = listener;

  useEffect(() => {
    if (!controller) return;
    const forward: StateChangedListener = (stateMachineName, stateName) =>
      listenerRef.current(stateMachineName, stateName);
    controller.registerListener(forward);
    return () => controller.unregisterListener(forward);
  }, [controller]);
}
