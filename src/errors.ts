export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class AssistantExecutionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AssistantExecutionError";
  }
}

export class AssistantApiError extends AssistantExecutionError {
  constructor(message: string, public readonly status?: number) {
    super(message);
    this.name = "AssistantApiError";
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
