import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from '@nestjs/common';
import type { Response } from 'express';
import { EngineError, EngineErrorKind } from './errors';

const STATUS_BY_KIND: Record<EngineErrorKind, HttpStatus> = {
  configuration: HttpStatus.BAD_REQUEST,
  not_found: HttpStatus.NOT_FOUND,
  invalid_transition: HttpStatus.CONFLICT,
  resource_busy: HttpStatus.CONFLICT,
  resource_timeout: HttpStatus.INTERNAL_SERVER_ERROR,
  retryable: HttpStatus.INTERNAL_SERVER_ERROR,
  fatal: HttpStatus.INTERNAL_SERVER_ERROR,
  timeout: HttpStatus.INTERNAL_SERVER_ERROR,
};

export function httpStatusFor(error: EngineError): HttpStatus {
  return STATUS_BY_KIND[error.kind];
}

/** Engine errors reach HTTP clients as `{ statusCode, error, message }`. */
@Catch(EngineError)
export class EngineExceptionFilter implements ExceptionFilter<EngineError> {
  private readonly logger = new Logger(EngineExceptionFilter.name);

  catch(exception: EngineError, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();
    const statusCode = httpStatusFor(exception);

    if (statusCode >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(exception.message, exception.stack);
    }

    response.status(statusCode).json({
      statusCode,
      error: exception.kind,
      message: exception.message,
    });
  }
}
