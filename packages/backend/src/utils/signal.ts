/**
 * One-shot signal: set once, awaited any number of times
 */
export interface Signal {
  readonly promise: Promise<void>;
  readonly isSet: boolean;
  set(): void;
}

export function createSignal(): Signal {
  let resolve: () => void = () => undefined;
  let isSet = false;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });

  return {
    promise,
    get isSet() {
      return isSet;
    },
    set() {
      if (!isSet) {
        isSet = true;
        resolve();
      }
    },
  };
}
