import { ErrorRequestHandler } from 'express';
import { PinoLogger } from 'nestjs-pino';

export const WEBHOOK_PATHS = ['/payment/webhook', '/payment/easebuzz/callback'];

/**
 * Body parsing runs before routing, so a malformed or oversized webhook body never reaches
 * `WebhookAckFilter`. Mounted on the webhook paths, after the parsers.
 */
export function webhookBodyErrorHandler(logger: PinoLogger): ErrorRequestHandler {
  // Express only treats four-argument middleware as an error handler
  return (error, request, response, _next) => {
    logger.warn({ err: error, path: request.originalUrl }, 'Webhook body rejected, acknowledging');
    response.status(200).type('text/plain').send('OK');
  };
}
