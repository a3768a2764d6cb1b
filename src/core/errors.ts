export class RightsizerError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly stage?: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'RightsizerError';
  }
}

export class ConfigError extends RightsizerError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', 'config', cause);
    this.name = 'ConfigError';
  }
}

/** Completion transport failure (LLM API call). */
export class ProviderError extends RightsizerError {
  constructor(message: string, public readonly provider: string, cause?: Error) {
    super(message, 'PROVIDER_ERROR', 'ai', cause);
    this.name = 'ProviderError';
  }
}

/** Inventory, catalog, price or quota lookup failure. */
export class CollaboratorError extends RightsizerError {
  constructor(message: string, public readonly collaborator: string, stage: string, cause?: Error) {
    super(message, 'COLLABORATOR_ERROR', stage, cause);
    this.name = 'CollaboratorError';
  }
}

export class AnalysisTimeoutError extends RightsizerError {
  constructor(public readonly label: string, public readonly timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`, 'ANALYSIS_TIMEOUT', 'analyze');
    this.name = 'AnalysisTimeoutError';
  }
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
