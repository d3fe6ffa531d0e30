import { Body, Controller, Header, HttpCode, HttpStatus, Post, UseFilters } from '@nestjs/common';
import { CallbackParams } from './callback-payload';
import { CallbacksService } from './callbacks.service';
import { WebhookAckFilter } from './filters/webhook-ack.filter';
import { RedirectOutcome } from './types/callback.types';
import { renderOutcomePage } from './views/outcome-page';

@Controller('payment')
export class CallbacksController {
  constructor(private readonly callbacksService: CallbacksService) {}

  @Post(['webhook', 'easebuzz/callback'])
  @HttpCode(HttpStatus.OK)
  @Header('Content-Type', 'text/plain; charset=utf-8')
  @UseFilters(WebhookAckFilter)
  async webhook(@Body() body: CallbackParams): Promise<string> {
    await this.callbacksService.handleWebhook(body);
    return 'OK';
  }

  @Post('success')
  @HttpCode(HttpStatus.OK)
  @Header('Content-Type', 'text/html; charset=utf-8')
  async success(@Body() body: CallbackParams): Promise<string> {
    return renderOutcomePage(await this.callbacksService.handleRedirect(body, RedirectOutcome.SUCCESS));
  }

  @Post('failure')
  @HttpCode(HttpStatus.OK)
  @Header('Content-Type', 'text/html; charset=utf-8')
  async failure(@Body() body: CallbackParams): Promise<string> {
    return renderOutcomePage(await this.callbacksService.handleRedirect(body, RedirectOutcome.FAILURE));
  }
}
