import { Inject, Injectable } from '@nestjs/common';
import { InjectPinoLogger, PinoLogger } from 'nestjs-pino';
import { gatewayConfig, GatewayConfig } from '../config/configuration';
import { GatewayCallResult, GatewayReply, InitiationForm } from './types/gateway.types';

const isTimeout = (error: unknown): boolean =>
  error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');

function toReply(raw: string): GatewayReply {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    parsed = undefined;
  }

  if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
    return parsed;
  }
  return { status: 0, data: raw.slice(0, 500) };
}

/**
 * Thin wrapper around the gateway's initiateLink endpoint. Transport failures come back as
 * values so the caller can classify them next to gateway-reported errors.
 */
@Injectable()
export class GatewayClient {
  constructor(
    @Inject(gatewayConfig.KEY)
    private readonly gateway: GatewayConfig,
    @InjectPinoLogger(GatewayClient.name)
    private readonly logger: PinoLogger,
  ) {}

  async initiate(form: InitiationForm): Promise<GatewayCallResult> {
    const startedAt = Date.now();

    try {
      const response = await fetch(this.gateway.initiateUrl, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          Accept: 'application/json',
        },
        body: new URLSearchParams({ ...form }).toString(),
        signal: AbortSignal.timeout(this.gateway.timeoutMs),
      });

      const body = toReply(await response.text());

      this.logger.info(
        { txnid: form.txnid, httpStatus: response.status, latencyMs: Date.now() - startedAt },
        'Gateway initiation call completed',
      );

      return { kind: 'reply', httpStatus: response.status, body };
    } catch (error) {
      if (isTimeout(error)) {
        this.logger.warn(
          { txnid: form.txnid, timeoutMs: this.gateway.timeoutMs },
          'Gateway initiation call timed out',
        );
        return { kind: 'timeout', timeoutMs: this.gateway.timeoutMs };
      }

      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error({ txnid: form.txnid, err: error }, 'Gateway unreachable');
      return { kind: 'unreachable', reason };
    }
  }
}
