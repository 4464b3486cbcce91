export type StoreListener = () => void;

export interface ExternalStore<T> {
  readonly getSnapshot: () => T;
  readonly subscribe: (listener: StoreListener) => () => void;
  /** Stores `value` and notifies listeners unless it equals the current snapshot. */
  readonly setSnapshot: (value: T) => boolean;
  readonly listenerCount: () => number;
}

export const createExternalStore = <T>(
  initialSnapshot: T,
  equals: (left: T, right: T) => boolean = Object.is,
): ExternalStore<T> => {
  let snapshot = initialSnapshot;
  const listeners = new Set<StoreListener>();

  return {
    getSnapshot: () => snapshot,
    subscribe: (listener) => {
      listeners.add(listener);
      let active = true;
      return () => {
        if (!active) {
          return;
        }
        active = false;
        listeners.delete(listener);
      };
    },
    setSnapshot: (value) => {
      if (equals(snapshot, value)) {
        return false;
      }
      snapshot = value;
      for (const listener of Array.from(listeners)) {
        listener();
      }
      return true;
    },
    listenerCount: () => listeners.size,
  };
};
