/**
 * Maps retrieval failures onto HTTP errors.
 * Configuration faults are 500; failures of a downstream stage are 502.
 */

import { HttpException, HttpStatus } from '@nestjs/common';
import {
  ConfigError,
  RetrievalError,
  SubQuestionRetrievalError,
} from './errors/retrieval-errors';

export function toHttpException(error: unknown): unknown {
  if (!(error instanceof RetrievalError)) return error;

  const status = error instanceof ConfigError ? HttpStatus.INTERNAL_SERVER_ERROR : HttpStatus.BAD_GATEWAY;
  return new HttpException(
    {
      statusCode: status,
      message: error.message,
      stage: error.stage,
      ...(error instanceof SubQuestionRetrievalError && { subQuestion: error.subQuestion }),
    },
    status,
    { cause: error },
  );
}
