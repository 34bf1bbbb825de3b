export type Dispatch = (task: () => void) => void;

export const defaultDispatch: Dispatch = (task) => {
  queueMicrotask(task);
};

export interface DeliveryChannel {
  readonly generation: number;
  /** Hands `value` to `listener` through the dispatcher unless the channel is invalidated first. */
  post<T>(listener: ((value: T) => void) | undefined, value: T): void;
  /** Drops every post that has not been delivered yet. */
  invalidate(): void;
}

export function createDeliveryChannel(dispatch: Dispatch = defaultDispatch): DeliveryChannel {
  let generation = 0;

  return {
    get generation() {
      return generation;
    },
    post(listener, value) {
      if (!listener) return;
      const sentAt = generation;
      dispatch(() => {
        if (sentAt !== generation) return;
        listener(value);
      });
    },
    invalidate() {
      generation += 1;
    }
  };
}
