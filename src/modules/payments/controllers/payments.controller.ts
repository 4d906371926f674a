import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Post,
  UseGuards,
  UseInterceptors,
} from '@nestjs/common';
import {
  Caller,
  CurrentCaller,
  PermissionsGuard,
  RequirePermissions,
} from '../../../core/auth';
import { Timeout } from '../../../core/timeout/timeout.decorator';
import { TimeoutInterceptor } from '../../../core/timeout/timeout.interceptor';
import {
  InitiatePaymentResponse,
  PaymentResponse,
} from '../dto/payment-response.dto';
import { RefundPaymentDto } from '../dto/refund-payment.dto';
import { PaymentMapper } from '../mappers/payment.mapper';
import { PaymentsService } from '../services/payments.service';

@Controller('orders')
@UseGuards(PermissionsGuard)
@UseInterceptors(TimeoutInterceptor)
export class PaymentsController {
  constructor(private readonly paymentsService: PaymentsService) {}

  @Get('payments')
  @RequirePermissions('read')
  async getMyPayments(
    @CurrentCaller() caller: Caller,
  ): Promise<PaymentResponse[]> {
    const payments = await this.paymentsService.getUserPayments(caller.userId);
    return payments.map((payment) => PaymentMapper.toResponse(payment));
  }

  @Post(':orderId/pay')
  @HttpCode(HttpStatus.OK)
  @RequirePermissions('read')
  @Timeout(60000)
  async pay(
    @CurrentCaller() caller: Caller,
    @Param('orderId', ParseIntPipe) orderId: number,
  ): Promise<InitiatePaymentResponse> {
    const clientSecret = await this.paymentsService.initiatePayment(
      orderId,
      caller.userId,
    );
    return { clientSecret };
  }

  @Post(':orderId/refund')
  @HttpCode(HttpStatus.OK)
  @RequirePermissions('read')
  @Timeout(60000)
  async refund(
    @CurrentCaller() caller: Caller,
    @Param('orderId', ParseIntPipe) orderId: number,
    @Body() body: RefundPaymentDto,
  ): Promise<PaymentResponse> {
    const payment = await this.paymentsService.refundPayment(
      orderId,
      caller.userId,
      body.amount,
    );
    return PaymentMapper.toResponse(payment);
  }

  @Get(':orderId/payments')
  @RequirePermissions('read')
  async getOrderPayments(
    @CurrentCaller() caller: Caller,
    @Param('orderId', ParseIntPipe) orderId: number,
  ): Promise<PaymentResponse[]> {
    const payments = await this.paymentsService.getOrderPayments(
      orderId,
      caller.userId,
    );
    return payments.map((payment) => PaymentMapper.toResponse(payment));
  }
}
