/**
 * Track `error` listeners that a test adds to process.stdout/stderr so they
 * can be removed afterwards.
 */

type Listener = (...args: unknown[]) => void;

export interface ListenerSnapshot {
  readonly stdout: ReadonlySet<unknown>;
  readonly stderr: ReadonlySet<unknown>;
}

export function captureErrorListeners(): ListenerSnapshot {
  return {
    stdout: new Set(process.stdout.listeners('error')),
    stderr: new Set(process.stderr.listeners('error')),
  };
}

/** Listeners added to `stream` since `before`. */
export function addedListeners(
  stream: NodeJS.WriteStream,
  before: ReadonlySet<unknown>,
): Listener[] {
  return stream.listeners('error').filter((listener): listener is Listener => !before.has(listener));
}

export function removeNewListeners(before: ListenerSnapshot): void {
  for (const listener of addedListeners(process.stdout, before.stdout)) {
    process.stdout.off('error', listener);
  }
  for (const listener of addedListeners(process.stderr, before.stderr)) {
    process.stderr.off('error', listener);
  }
}
