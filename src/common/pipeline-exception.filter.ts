/**
 * Maps pipeline errors that escape a controller onto HTTP responses.
 */

import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from '@nestjs/common';
import type { Response } from 'express';
import type { PipelineErrorKind } from '../types/job.types.js';
import { PipelineError } from './errors.js';

const STATUS_BY_KIND: Record<PipelineErrorKind, HttpStatus> = {
  invalid_request: HttpStatus.BAD_REQUEST,
  storage: HttpStatus.SERVICE_UNAVAILABLE,
  transient_provider: HttpStatus.BAD_GATEWAY,
  permanent_provider: HttpStatus.BAD_GATEWAY,
  normalization: HttpStatus.BAD_GATEWAY,
  timeout: HttpStatus.GATEWAY_TIMEOUT,
  internal: HttpStatus.INTERNAL_SERVER_ERROR,
};

export function httpStatusFor(err: PipelineError): HttpStatus {
  if (err.reason === 'unknown_file') return HttpStatus.NOT_FOUND;
  return STATUS_BY_KIND[err.kind];
}

@Catch(PipelineError)
export class PipelineExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(PipelineExceptionFilter.name);

  catch(exception: PipelineError, host: ArgumentsHost) {
    const response = host.switchToHttp().getResponse<Response>();
    const status = httpStatusFor(exception);
    if (status >= 500) {
      this.logger.error(`[${exception.kind}] ${exception.message}`);
    }
    response.status(status).json({ statusCode: status, ...exception.toDetail() });
  }
}
