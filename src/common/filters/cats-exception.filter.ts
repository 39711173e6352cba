import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Response } from 'express';
import {
  AdoptionRequestError,
  CatNotFoundError,
  CatsError,
  CatValidationError,
  StateConflictError,
  StoreError,
} from '../../cats/errors/cat.errors';

interface ErrorResponse {
  status: HttpStatus;
  body: Record<string, unknown>;
}

export function toErrorResponse(exception: CatsError): ErrorResponse {
  if (exception instanceof CatValidationError) {
    return {
      status: HttpStatus.BAD_REQUEST,
      body: { status: 'error', message: exception.message, errors: exception.messages() },
    };
  }
  if (exception instanceof StateConflictError || exception instanceof AdoptionRequestError) {
    return { status: HttpStatus.BAD_REQUEST, body: { error: exception.message } };
  }
  if (exception instanceof CatNotFoundError) {
    return {
      status: HttpStatus.NOT_FOUND,
      body: { status: 'error', message: exception.message },
    };
  }
  const message =
    exception instanceof StoreError ? exception.message : 'Internal server error';
  return {
    status: HttpStatus.INTERNAL_SERVER_ERROR,
    body: { status: 'error', message },
  };
}

/**
 * Turns shelter domain errors into HTTP responses. Store failures were
 * already logged with their cause where they happened; only the safe
 * message reaches the client.
 */
@Catch(CatsError)
export class CatsExceptionFilter implements ExceptionFilter<CatsError> {
  private readonly logger = new Logger(CatsExceptionFilter.name);

  catch(exception: CatsError, host: ArgumentsHost) {
    const response = host.switchToHttp().getResponse<Response>();
    const { status, body } = toErrorResponse(exception);

    if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(`${exception.name}: ${exception.message}`);
    } else {
      this.logger.debug(`${exception.name}: ${exception.message}`);
    }

    response.status(status).json(body);
  }
}
