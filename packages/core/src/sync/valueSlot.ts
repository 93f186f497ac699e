/**
 * A single mutable value whose changes can be observed. Subscribers are only
 * told about values set after they subscribe.
 */
export interface ValueSlot<T> {
  readonly value: T;
  set(value: T): void;
  subscribe(observer: (value: T) => void): () => void;
}

export function createValueSlot<T>(initial: T): ValueSlot<T> {
  let current = initial;
  const observers = new Set<(value: T) => void>();

  return {
    get value() {
      return current;
    },
    set(value: T) {
      if (Object.is(value, current)) return;
      current = value;
      for (const observer of Array.from(observers)) observer(value);
    },
    subscribe(observer: (value: T) => void) {
      observers.add(observer);
      return () => {
        observers.delete(observer);
      };
    },
  };
}

/**
 * Resolves with the slot's value as soon as it is non-null, or with `null`
 * once `timeoutMs` has elapsed.
 */
export function firstNonNull<T>(
  slot: ValueSlot<T | null>,
  timeoutMs: number
): Promise<T | null> {
  const current = slot.value;
  if (current !== null) return Promise.resolve(current);

  return new Promise((resolve) => {
    const unsubscribe = slot.subscribe((value) => {
      if (value === null) return;
      clearTimeout(timer);
      unsubscribe();
      resolve(value);
    });
    const timer = setTimeout(() => {
      unsubscribe();
      resolve(null);
    }, timeoutMs);
  });
}
