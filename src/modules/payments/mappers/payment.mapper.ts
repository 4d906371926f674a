import { PaymentResponse } from '../dto/payment-response.dto';
import { Payment } from '../entities/payment.entity';

export class PaymentMapper {
  static toResponse(payment: Payment): PaymentResponse {
    return {
      id: payment.id,
      userId: payment.userId,
      orderId: payment.orderId,
      createdAt: payment.createdAt,
      status: payment.status,
      amount: payment.amount,
      externalPaymentId: payment.externalPaymentId,
      items: (payment.items ?? []).map((item) => ({
        id: item.id,
        orderItemId: item.orderItemId,
        priceAtPayment: item.priceAtPayment,
      })),
    };
  }
}
