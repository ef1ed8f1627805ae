/**
 * Retrieval Custom Errors
 * Every failure raised by the retrieval core names the stage it came from
 */

export type RetrievalStage =
  | 'config'
  | 'embedding'
  | 'store'
  | 'decomposition'
  | 'retrieval'
  | 'timeout'
  | 'extraction'
  | 'synthesis';

export class RetrievalError extends Error {
  constructor(
    message: string,
    public readonly stage: RetrievalStage,
    public readonly originalError?: Error,
  ) {
    super(message);
    this.name = 'RetrievalError';
  }
}

export class ConfigError extends RetrievalError {
  constructor(message: string) {
    super(`Invalid configuration: ${message}`, 'config');
    this.name = 'ConfigError';
  }
}

export class EmbeddingError extends RetrievalError {
  constructor(message: string, originalError?: Error) {
    super(`Embedding failed: ${message}`, 'embedding', originalError);
    this.name = 'EmbeddingError';
  }
}

export class StoreError extends RetrievalError {
  constructor(message: string, originalError?: Error) {
    super(`Vector store operation failed: ${message}`, 'store', originalError);
    this.name = 'StoreError';
  }
}

/**
 * Raised by a reference extractor when a payload location has the wrong shape.
 * Never leaves the extraction pipeline.
 */
export class ReferenceValidationError extends RetrievalError {
  constructor(
    message: string,
    public readonly field: string,
  ) {
    super(`Malformed ${field}: ${message}`, 'extraction');
    this.name = 'ReferenceValidationError';
  }
}

export class QueryDecompositionError extends RetrievalError {
  constructor(message: string, originalError?: Error) {
    super(`Query decomposition failed: ${message}`, 'decomposition', originalError);
    this.name = 'QueryDecompositionError';
  }
}

export class AnswerSynthesisError extends RetrievalError {
  constructor(message: string, originalError?: Error) {
    super(`Answer synthesis failed: ${message}`, 'synthesis', originalError);
    this.name = 'AnswerSynthesisError';
  }
}

export class SubQuestionRetrievalError extends RetrievalError {
  constructor(
    public readonly subQuestion: string,
    stage: RetrievalStage,
    message: string,
    originalError?: Error,
  ) {
    super(
      `Retrieval failed for sub-question "${subQuestion}" at stage ${stage}: ${message}`,
      stage,
      originalError,
    );
    this.name = 'SubQuestionRetrievalError';
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
