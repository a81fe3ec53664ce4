const describeCause = (cause: unknown): string | undefined =>
  cause instanceof Error ? cause.message : cause ? String(cause) : undefined;

export class ClassificationFailure extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause instanceof Error ? { cause } : undefined);
    this.name = 'ClassificationFailure';
  }
}

export class IngestionFailure extends Error {
  readonly details?: string[];

  constructor(message: string, details?: string[]) {
    super(message);
    this.name = 'IngestionFailure';
    this.details = details;
  }
}

export class RevisionFailure extends Error {
  readonly originalMessage?: string;

  constructor(message: string, cause?: unknown) {
    super(message, cause instanceof Error ? { cause } : undefined);
    this.name = 'RevisionFailure';
    this.originalMessage = describeCause(cause);
  }
}

export class MessagingFailure extends Error {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = 'MessagingFailure';
    this.status = status;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error ?? 'unknown error');
