export class VeritaError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public override readonly cause?: Error,
  ) {
    super(message);
    this.name = 'VeritaError';
  }
}

export class IngestionError extends VeritaError {
  constructor(message: string, cause?: Error) {
    super(message, 'INGESTION_ERROR', cause);
    this.name = 'IngestionError';
  }
}

export class AgentError extends VeritaError {
  constructor(message: string, cause?: Error) {
    super(message, 'AGENT_ERROR', cause);
    this.name = 'AgentError';
  }
}

export class LlmError extends VeritaError {
  constructor(
    message: string,
    public readonly isTransient: boolean,
    cause?: Error,
  ) {
    super(message, 'LLM_ERROR', cause);
    this.name = 'LlmError';
  }
}

export class SearchError extends VeritaError {
  constructor(message: string, cause?: Error) {
    super(message, 'SEARCH_ERROR', cause);
    this.name = 'SearchError';
  }
}

export class SchemaValidationError extends VeritaError {
  constructor(
    message: string,
    public readonly validationErrors: readonly string[],
  ) {
    super(message, 'SCHEMA_VALIDATION_ERROR');
    this.name = 'SchemaValidationError';
  }
}

export class ConfigurationError extends VeritaError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}
