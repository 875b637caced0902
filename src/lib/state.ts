/**
 * Minimal reactive primitives shared by the resources.
 *
 * An atom holds one value; a subscription fans a value out to listeners.
 * Listeners run synchronously, in the order they subscribed.
 */

export type Atom<T> = {
  get: () => T;
  update: (fn: (current: T) => T) => void;
};

export type Subscription<T> = {
  subscribe: (listener: (value: T) => void) => () => void;
  notify: (value: T) => void;
};

export function createSubscription<T>(): Subscription<T> {
  const listeners = new Set<(value: T) => void>();

  return {
    subscribe: (listener) => {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
    notify: (value) => {
      // Copy so a listener may unsubscribe while being notified
      for (const listener of [...listeners]) {
        listener(value);
      }
    },
  };
}

export function createAtom<T>(initial: T): Atom<T> {
  let value = initial;

  return {
    get: () => value,
    update: (fn) => {
      value = fn(value);
    },
  };
}
