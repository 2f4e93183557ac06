/**
 * Bounded status channel between the inbound loop and consumers.
 *
 * push() never blocks: when the buffer is full the oldest entry is dropped
 * and counted. Iterators share one buffer, so each entry reaches one reader.
 */

export type StatusChannel<T> = Readonly<{
  push(item: T): void;
  close(): void;
  isClosed(): boolean;
  size(): number;
  getDroppedCount(): number;
  [Symbol.asyncIterator](): AsyncIterableIterator<T>;
}>;

type Waiter<T> = (result: IteratorResult<T, undefined>) => void;

export function createStatusChannel<T>(capacity: number): StatusChannel<T> {
  if (!Number.isInteger(capacity) || capacity < 1) {
    throw new RangeError(`Channel capacity must be a positive integer, got ${capacity}`);
  }

  const buffer: T[] = [];
  const waiters: Waiter<T>[] = [];
  let dropped = 0;
  let closed = false;

  const push = (item: T): void => {
    if (closed) return;

    const waiter = waiters.shift();
    if (waiter) {
      waiter({ value: item, done: false });
      return;
    }

    if (buffer.length >= capacity) {
      buffer.shift();
      dropped++;
    }
    buffer.push(item);
  };

  const close = (): void => {
    if (closed) return;
    closed = true;
    for (const waiter of waiters.splice(0)) {
      waiter({ value: undefined, done: true });
    }
  };

  const next = async (): Promise<IteratorResult<T, undefined>> => {
    const value = buffer.shift();
    if (value !== undefined) {
      return { value, done: false };
    }
    if (closed) {
      return { value: undefined, done: true };
    }
    return new Promise<IteratorResult<T, undefined>>((resolve) => {
      waiters.push(resolve);
    });
  };

  const iterator = (): AsyncIterableIterator<T> => {
    const it: AsyncIterableIterator<T> = {
      next,
      return: async (): Promise<IteratorResult<T, undefined>> => ({ value: undefined, done: true }),
      [Symbol.asyncIterator]: () => it,
    };
    return it;
  };

  return {
    push,
    close,
    isClosed: () => closed,
    size: () => buffer.length,
    getDroppedCount: () => dropped,
    [Symbol.asyncIterator]: iterator,
  };
}
