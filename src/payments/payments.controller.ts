import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { toHttpException } from '../common/payment-error';
import { InitiatePaymentDto } from './dto/initiate-payment.dto';
import { PaymentsService } from './payments.service';

@Controller('payments')
export class PaymentsController {
  constructor(private readonly paymentsService: PaymentsService) {}

  @Post('initiate')
  @HttpCode(HttpStatus.CREATED)
  async initiate(@Body() dto: InitiatePaymentDto) {
    const outcome = await this.paymentsService.initiate(dto);

    if (!outcome.ok) {
      throw toHttpException(outcome.failure);
    }

    return {
      success: true,
      message: 'Payment initiated successfully',
      data: {
        txnid: outcome.value.txnid,
        access_key: outcome.value.accessKey,
        payment_url: outcome.value.paymentUrl,
      },
    };
  }
}
