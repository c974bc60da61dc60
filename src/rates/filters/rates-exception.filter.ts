import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  Injectable,
  Logger,
} from '@nestjs/common';
import { Response } from 'express';

import {
  AllProvidersExhaustedException,
  RateResolutionException,
} from '../exceptions';

@Injectable()
@Catch(RateResolutionException)
export class RatesExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(RatesExceptionFilter.name);

  catch(exception: RateResolutionException, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();
    const status = exception.httpStatus;

    this.logger.debug(`${exception.name}: ${exception.message}`);

    response.status(status).json({
      statusCode: status,
      timestamp: new Date().toISOString(),
      message: exception.message,
      ...(exception instanceof AllProvidersExhaustedException
        ? {
            attempts: exception.attempts.map(({ source, reason, message }) => ({
              source,
              reason,
              message,
            })),
          }
        : {}),
    });
  }
}
