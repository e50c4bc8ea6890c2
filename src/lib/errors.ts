import type { ZodError } from 'zod';

/** Bad or missing configuration: unknown focus, repo or provider, missing API key. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class ProviderApiError extends Error {
  constructor(message: string, readonly status?: number) {
    super(message);
    this.name = 'ProviderApiError';
  }
}

/** The judge answered, but not with the findings shape. */
export class ModelOutputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ModelOutputError';
  }
}

export class DecisionStoreError extends Error {
  constructor(message: string, readonly lineNumber?: number) {
    super(message);
    this.name = 'DecisionStoreError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function describeZodError(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
