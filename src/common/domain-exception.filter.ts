import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from '@nestjs/common';
import type { Response } from 'express';
import { DomainError } from './errors';

@Catch(DomainError)
export class DomainExceptionFilter implements ExceptionFilter<DomainError> {
  private readonly logger = new Logger(DomainExceptionFilter.name);

  catch(exception: DomainError, host: ArgumentsHost) {
    const response = host.switchToHttp().getResponse<Response>();

    if (exception.status >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(`${exception.name}: ${exception.message}`, exception.stack);
    } else {
      this.logger.warn(`${exception.name}: ${exception.message}`);
    }

    response.status(exception.status).json({
      statusCode: exception.status,
      error: exception.name,
      message: exception.message,
      ...exception.details,
    });
  }
}
