import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus, Injectable, Logger } from '@nestjs/common';
import type { Response } from 'express';
import { AnalyticsService } from '../analytics/analytics.service';
import type { RequestWithId } from '../common/middleware/request-id.middleware';
import { renderNotFoundPage } from '../pages/render';
import { InvalidKeyError, ObjectMissingError } from './file-errors';

function httpExceptionMessage(exception: HttpException): string {
  const payload = exception.getResponse();
  if (typeof payload === 'string') {
    return payload;
  }
  if (payload && typeof payload === 'object' && 'message' in payload) {
    const { message } = payload;
    if (Array.isArray(message)) return message.join(', ');
    if (typeof message === 'string') return message;
  }
  return exception.message;
}

/**
 * Turns errors into responses: a "no file found" page for anything that
 * resolves to 404, the exception's own status and message for other HTTP
 * exceptions, and a generic 500 for the rest.
 */
@Catch()
@Injectable()
export class FileErrorFilter implements ExceptionFilter {
  private readonly logger = new Logger(FileErrorFilter.name);

  constructor(private readonly analytics: AnalyticsService) {}

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const res = ctx.getResponse<Response>();
    const req = ctx.getRequest<RequestWithId>();
    const where = `${req.method} ${req.originalUrl || req.url}`;
    const requestId = req.requestId ? ` [${req.requestId}]` : '';

    if (exception instanceof InvalidKeyError) {
      this.logger.error(`Data integrity anomaly on ${where}${requestId}: ${exception.message}`);
    } else if (exception instanceof Error) {
      this.logger.error(`Request error on ${where}${requestId}: ${exception.message}`, exception.stack);
    } else {
      this.logger.error(`Request error on ${where}${requestId}: ${String(exception)}`);
    }

    if (res.headersSent) {
      return;
    }

    const status = exception instanceof HttpException ? exception.getStatus() : HttpStatus.INTERNAL_SERVER_ERROR;
    if (exception instanceof ObjectMissingError || status === HttpStatus.NOT_FOUND) {
      res.status(HttpStatus.NOT_FOUND).type('html').send(renderNotFoundPage(this.analytics.domain));
      return;
    }

    const message = exception instanceof HttpException ? httpExceptionMessage(exception) : 'Internal server error';
    res.status(status).type('text/plain').send(message);
  }
}
