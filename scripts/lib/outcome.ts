export class CheckError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'CheckError';
  }
}

export type Outcome<T = void> =
  | { ok: true; value: T }
  | { ok: false; error: CheckError };

export function succeed(): Outcome<void>;
export function succeed<T>(value: T): Outcome<T>;
export function succeed<T>(value?: T): Outcome<T | undefined> {
  return { ok: true, value };
}

export function fail(message: string, cause?: unknown): { ok: false; error: CheckError } {
  return { ok: false, error: new CheckError(message, cause) };
}

export function toCheckError(error: unknown): CheckError {
  if (error instanceof CheckError) {
    return error;
  }
  return new CheckError(error instanceof Error ? error.message : String(error), error);
}

/**
 * Renders the message chain, outermost context first:
 * `File 'a.md' failed spell check: <reason>`.
 */
export function describeError(error: unknown): string {
  const parts: string[] = [];
  let current: unknown = error;

  while (current !== undefined && current !== null) {
    const message = current instanceof Error ? current.message : String(current);
    if (message && !parts.includes(message)) {
      parts.push(message);
    }
    current = current instanceof Error ? current.cause : undefined;
  }

  return parts.join(': ');
}
