import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Response } from 'express';
import { PipelineException } from './pipeline.exception';

const UNAVAILABLE_CODES: ReadonlySet<string> = new Set([
  'REPOSITORY_UNAVAILABLE',
  'STORAGE_UNAVAILABLE',
]);

/**
 * Renders a PipelineException that escaped to a controller.
 *
 * Only infrastructure failures get here (the orchestrator turns every
 * other failure into a failed document): an unreachable repository or
 * storage medium is 503, anything else 500.
 */
@Catch(PipelineException)
export class PipelineExceptionFilter implements ExceptionFilter<PipelineException> {
  private readonly logger = new Logger(PipelineExceptionFilter.name);

  catch(exception: PipelineException, host: ArgumentsHost): void {
    const res = host.switchToHttp().getResponse<Response>();
    const statusCode = UNAVAILABLE_CODES.has(exception.code)
      ? HttpStatus.SERVICE_UNAVAILABLE
      : HttpStatus.INTERNAL_SERVER_ERROR;

    this.logger.error(`[${exception.code}] ${exception.message}`);

    if (res.headersSent) {
      res.end();
      return;
    }

    res.status(statusCode).json({
      statusCode,
      error:
        statusCode === HttpStatus.SERVICE_UNAVAILABLE
          ? 'Service Unavailable'
          : 'Internal Server Error',
      code: exception.code,
      message: exception.message,
    });
  }
}
