import { ExceptionFilter, Catch, ArgumentsHost, Logger } from '@nestjs/common';
import { Response } from 'express';
import { ContactBookError } from './contactbook-error';

@Catch(ContactBookError)
export class ContactBookErrorFilter implements ExceptionFilter {
  private readonly logger = new Logger(ContactBookErrorFilter.name);

  catch(exception: ContactBookError, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();

    this.logger.warn(
      `${exception.code}: ${exception.message}`,
      exception.originalError?.stack,
    );

    if (exception.httpStatusCode === 401) {
      response.setHeader('WWW-Authenticate', 'Bearer');
    }

    response.status(exception.httpStatusCode).json(exception.toJSON());
  }
}
