import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus } from '@nestjs/common';
import { Response } from 'express';
import { StructuredLoggerService } from '../logging/structured-logger.service';
import { DispatchError, DispatchErrorCode } from './dispatch-errors';

const STATUS_BY_CODE: Record<DispatchErrorCode, HttpStatus> = {
  validation_failed: HttpStatus.BAD_REQUEST,
  campaign_not_found: HttpStatus.NOT_FOUND,
  lifecycle_violation: HttpStatus.CONFLICT,
  quota_exceeded: HttpStatus.TOO_MANY_REQUESTS,
  gateway_send_failed: HttpStatus.BAD_GATEWAY,
  reconciliation_mismatch: HttpStatus.UNPROCESSABLE_ENTITY
};

export function httpStatusFor(error: DispatchError): HttpStatus {
  return STATUS_BY_CODE[error.code];
}

@Catch(DispatchError)
export class DispatchExceptionFilter implements ExceptionFilter<DispatchError> {
  constructor(private readonly logger: StructuredLoggerService) {}

  catch(error: DispatchError, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();
    const status = httpStatusFor(error);

    this.logger.warn(
      { type: 'request_rejected', code: error.code, status, message: error.message },
      DispatchExceptionFilter.name
    );

    response.status(status).json({
      error: {
        code: error.code,
        message: error.message,
        retryable: error.retryable
      }
    });
  }
}
