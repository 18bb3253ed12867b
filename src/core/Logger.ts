/**
 * Sink for the container's diagnostics, console-compatible.
 * Pass `{ debug() {}, warn() {} }` to silence it.
 */
export type Logger = Pick<Console, 'debug' | 'warn'>;
