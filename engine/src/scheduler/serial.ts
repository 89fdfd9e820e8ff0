/**
 * Serializer
 *
 * FIFO queue of async operations that runs them strictly one at a time.
 * Each caller gets its own operation's result or error; one failing
 * operation does not affect the ones queued behind it.
 */

export interface Serializer {
  run<T>(operation: () => T | Promise<T>): Promise<T>;
  /** Operations waiting or running */
  readonly pending: number;
}

export function createSerializer(): Serializer {
  const queue: Array<() => Promise<void>> = [];
  let running = false;
  let inFlight = 0;

  const drain = async (): Promise<void> => {
    if (running) return;
    running = true;

    let next = queue.shift();
    while (next) {
      // Every queued step settles its own promise and never rejects
      await next();
      next = queue.shift();
    }

    running = false;
  };

  return {
    run<T>(operation: () => T | Promise<T>): Promise<T> {
      inFlight++;
      return new Promise<T>((resolve, reject) => {
        queue.push(async () => {
          try {
            resolve(await operation());
          } catch (error) {
            reject(error);
          } finally {
            inFlight--;
          }
        });
        void drain();
      });
    },

    get pending(): number {
      return inFlight;
    },
  };
}
