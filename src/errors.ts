export class HealboxError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Thrown before any container is touched, e.g. the entry point is not in the FileSet. */
export class PreconditionError extends HealboxError {
  constructor(message: string) {
    super('PRECONDITION', message);
  }
}

/** The container runtime could not be reached or refused a lifecycle call. */
export class InfrastructureError extends HealboxError {
  constructor(message: string, cause?: unknown) {
    super('INFRASTRUCTURE', message, { cause });
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
