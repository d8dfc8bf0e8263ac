export class EpiriskError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'EpiriskError';
  }
}

export class MalformedClaimError extends EpiriskError {
  constructor(
    message: string,
    public readonly claimId: string,
  ) {
    super(message, 'MALFORMED_CLAIM');
    this.name = 'MalformedClaimError';
  }
}

export class MalformedEvidenceError extends EpiriskError {
  constructor(
    message: string,
    public readonly claimId: string,
    public readonly evidenceId?: string,
  ) {
    super(message, 'MALFORMED_EVIDENCE');
    this.name = 'MalformedEvidenceError';
  }
}

/** Raised for evidence keyed by a claim id that the answer does not contain. */
export class EvidenceMismatchError extends EpiriskError {
  constructor(public readonly claimId: string) {
    super(`Evidence references unknown claim: ${claimId}`, 'EVIDENCE_MISMATCH');
    this.name = 'EvidenceMismatchError';
  }
}

export class ConfigurationRangeError extends EpiriskError {
  constructor(
    message: string,
    public readonly option: string,
    public readonly value: number,
  ) {
    super(message, 'CONFIGURATION_RANGE_ERROR');
    this.name = 'ConfigurationRangeError';
  }
}

export class ConfigurationError extends EpiriskError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

export class SchemaValidationError extends EpiriskError {
  constructor(
    message: string,
    public readonly validationErrors: readonly string[],
  ) {
    super(message, 'SCHEMA_VALIDATION_ERROR');
    this.name = 'SchemaValidationError';
  }
}

export class LlmError extends EpiriskError {
  constructor(
    message: string,
    public readonly retryable: boolean,
    cause?: Error,
  ) {
    super(message, 'LLM_ERROR', cause);
    this.name = 'LlmError';
  }
}

export class AgentError extends EpiriskError {
  constructor(message: string, cause?: Error) {
    super(message, 'AGENT_ERROR', cause);
    this.name = 'AgentError';
  }
}

export class RetrievalError extends EpiriskError {
  constructor(message: string, cause?: Error) {
    super(message, 'RETRIEVAL_ERROR', cause);
    this.name = 'RetrievalError';
  }
}
