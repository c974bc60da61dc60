import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  Injectable,
  Logger,
} from '@nestjs/common';
import { Response } from 'express';

import {
  SourceApiException,
  SourceException,
  SourceNotFoundException,
  getFailureReason,
} from '../exceptions';

/**
 * Maps source failures that reach a controller directly (currency listings,
 * source management) to their own status. Failures during rate resolution
 * never get here: the resolver wraps them.
 */
@Injectable()
@Catch(SourceException)
export class SourcesExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(SourcesExceptionFilter.name);

  catch(exception: SourceException, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();
    const status = exception.httpStatus;

    if (exception instanceof SourceApiException) {
      this.logger.warn(
        `Source API error: ${exception.message}`,
        exception.cause instanceof Error ? exception.cause.stack : undefined,
      );
    } else if (!(exception instanceof SourceNotFoundException)) {
      this.logger.debug(`${exception.name}: ${exception.message}`);
    }

    response.status(status).json({
      statusCode: status,
      timestamp: new Date().toISOString(),
      message: exception.message,
      ...(exception instanceof SourceNotFoundException
        ? {}
        : { reason: getFailureReason(exception) }),
    });
  }
}
