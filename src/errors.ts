export type FetchFailureKind = 'timeout' | 'http' | 'network';

export class FetchError extends Error {
  readonly name = 'FetchError';

  constructor(
    readonly kind: FetchFailureKind,
    readonly url: string,
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class ConfigError extends Error {
  readonly name = 'ConfigError';

  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
  }
}

export class ToolInputError extends Error {
  readonly name = 'ToolInputError';

  constructor(readonly tool: string, readonly issues: string[]) {
    super(`Invalid arguments for ${tool}: ${issues.join('; ')}`);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
