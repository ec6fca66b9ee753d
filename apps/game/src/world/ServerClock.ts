/**
 * Authoritative time source. All engagement timing reads from here;
 * timestamps supplied by clients are never consulted.
 */
export interface ServerClock {
  /** Milliseconds on a monotonic-enough server timeline. */
  now(): number;
}

export class SystemServerClock implements ServerClock {
  now(): number {
    return Date.now();
  }
}
