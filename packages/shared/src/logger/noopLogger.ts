import type { Logger } from './types';

/** Discards everything. Default for library callers that pass no logger. */
export class NoopLogger implements Logger {
  log(): void {}

  trace(): void {}

  debug(): void {}

  info(): void {}

  warn(): void {}

  error(): void {}

  child(): Logger {
    return this;
  }
}
