import { ExceptionFilter, Catch, ArgumentsHost, Logger } from '@nestjs/common';
import { Response } from 'express';
import { PortalError } from './portal-error';

@Catch(PortalError)
export class PortalErrorFilter implements ExceptionFilter {
  private readonly logger = new Logger(PortalErrorFilter.name);

  constructor(private readonly exposeDetail = false) {}

  catch(exception: PortalError, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();

    if (exception.httpStatusCode >= 500) {
      this.logger.error(
        `${exception.code}: ${exception.message}`,
        exception.originalError?.stack,
      );
    } else {
      this.logger.warn(`${exception.code}: ${exception.message}`);
    }

    response
      .status(exception.httpStatusCode)
      .json(exception.toJSON(this.exposeDetail));
  }
}
