/**
 * CommandLock - per-session mutex around transport exchanges
 *
 * Every write+read pair (and the transport close) runs inside run(), so
 * commands from the poller, the connect sweep and the user never interleave
 * on the wire. Waiters are served in call order.
 */

export interface CommandLock {
  run<T>(fn: () => Promise<T>): Promise<T>;
  isBusy(): boolean;
}

export function createCommandLock(): CommandLock {
  let commandLock: Promise<void> = Promise.resolve();
  let holders = 0;

  return {
    run<T>(fn: () => Promise<T>): Promise<T> {
      const previousLock = commandLock;
      let releaseLock: () => void = () => {};
      commandLock = new Promise<void>(resolve => {
        releaseLock = resolve;
      });
      holders++;
      return previousLock.then(fn).finally(() => {
        holders--;
        releaseLock();
      });
    },

    isBusy(): boolean {
      return holders > 0;
    },
  };
}
