import { TimeoutError } from '../errors.js';

export function withTimeout<T>(promise: Promise<T>, ms: number, operation: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(operation, ms)), ms);
  });

  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}
