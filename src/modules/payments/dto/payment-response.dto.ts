import { PaymentStatus } from '../../../domain/commerce';

export interface PaymentItemResponse {
  id: number;
  orderItemId: number;
  priceAtPayment: string;
}

export interface PaymentResponse {
  id: number;
  userId: number;
  orderId: number;
  createdAt: Date;
  status: PaymentStatus;
  amount: string;
  externalPaymentId: string | null;
  items: PaymentItemResponse[];
}

export interface InitiatePaymentResponse {
  clientSecret: string;
}

export type WebhookResponse =
  | { status: 'success'; paymentId: number; paymentStatus: PaymentStatus }
  | {
      status: 'failed';
      paymentId: number;
      paymentStatus: PaymentStatus;
      message: string;
    }
  | { status: 'ignored'; eventType: string };
