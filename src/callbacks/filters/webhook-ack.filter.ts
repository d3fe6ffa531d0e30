import { ArgumentsHost, Catch, ExceptionFilter } from '@nestjs/common';
import { Request, Response } from 'express';
import { InjectPinoLogger, PinoLogger } from 'nestjs-pino';

/**
 * Anything that escapes the webhook handler, including pipe and guard errors, still gets the
 * gateway's `200 OK`.
 */
@Catch()
export class WebhookAckFilter implements ExceptionFilter {
  constructor(
    @InjectPinoLogger(WebhookAckFilter.name)
    private readonly logger: PinoLogger,
  ) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    const http = host.switchToHttp();
    const request = http.getRequest<Request>();
    const response = http.getResponse<Response>();

    this.logger.error({ err: exception, path: request.url }, 'Unhandled webhook error, acknowledging');

    response.status(200).type('text/plain').send('OK');
  }
}
