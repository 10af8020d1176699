import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from '@nestjs/common';
import { Response } from 'express';
import { TypeORMError } from 'typeorm';

// Driver or connection failures reach the client as 503 with the underlying message
@Catch(TypeORMError)
export class PersistenceExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(PersistenceExceptionFilter.name);

  catch(exception: TypeORMError, host: ArgumentsHost) {
    const response = host.switchToHttp().getResponse<Response>();
    this.logger.error(`${exception.name}: ${exception.message}`, exception.stack);

    response.status(HttpStatus.SERVICE_UNAVAILABLE).json({
      statusCode: HttpStatus.SERVICE_UNAVAILABLE,
      error: 'Service Unavailable',
      message: `Erreur de persistance: ${exception.message}`,
    });
  }
}
