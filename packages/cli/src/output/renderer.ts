import pc from 'picocolors';
import { AppError } from '@embedcache/shared';

export interface ErrorPayload {
  code: string;
  message: string;
  details?: Record<string, unknown> | string;
}

export function toErrorPayload(e: unknown): ErrorPayload {
  if (e instanceof AppError) {
    return { code: e.code, message: e.message, details: e.details };
  }
  return { code: 'UnknownError', message: e instanceof Error ? e.message : String(e) };
}

/**
 * Command results go to stdout as JSON so they can be piped. Errors go to
 * stdout as JSON in json mode and to stderr otherwise.
 */
export class OutputRenderer {
  constructor(
    readonly isJson: boolean,
    private readonly verbose = false,
  ) {}

  data(value: unknown): void {
    console.log(JSON.stringify(value));
  }

  text(line: string): void {
    console.log(line);
  }

  error(e: unknown): void {
    if (this.isJson) {
      console.log(JSON.stringify({ error: toErrorPayload(e) }));
      return;
    }

    const { message, details } = toErrorPayload(e);
    console.error(pc.red(`❌ Error: ${message}`));
    if (details) {
      console.error(
        `  Details: ${typeof details === 'string' ? details : JSON.stringify(details, null, 2)}`,
      );
    }
    if (this.verbose && e instanceof Error && e.stack) {
      console.error(pc.gray(`\nStack Trace:\n${e.stack}`));
    } else {
      console.error(pc.gray('\nFor more details, run with the --verbose flag.'));
    }
  }
}
