// Bus error types

/**
 * Raised when an interface cannot receive or send: the link went down, the
 * capture ran out, the underlying process exited, or the bus was closed.
 * Fatal to the interface's pipeline, never to the process.
 */
export class ConnectivityError extends Error {
  readonly code = 'CONNECTIVITY_ERROR';
  readonly interfaceName: string;
  readonly cause?: Error;

  constructor(interfaceName: string, reason: string, cause?: Error) {
    super(`Interface ${interfaceName}: ${reason}`);
    this.name = 'ConnectivityError';
    this.interfaceName = interfaceName;
    this.cause = cause;
  }
}

/**
 * Raised by receive() when its AbortSignal fires.
 */
export class ReceiveCancelledError extends Error {
  constructor() {
    super('Receive cancelled');
    this.name = 'AbortError';
  }
}

/**
 * True for cancellation errors, whether raised by a bus or by a timer
 * (node:timers/promises rejects with an AbortError).
 */
export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}
