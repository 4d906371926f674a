import { IntentStatus } from '../interfaces';
import { PaymentStatus } from '../models';

const AWAITING_CUSTOMER: readonly string[] = [
  IntentStatus.REQUIRES_PAYMENT_METHOD,
  IntentStatus.REQUIRES_CONFIRMATION,
  IntentStatus.REQUIRES_ACTION,
];

/**
 * IntentStatusMapper - maps provider intent statuses onto local payment
 * statuses.
 *
 * Anything the provider reports that is not explicitly mapped (canceled,
 * requires_capture, unknown future statuses) ends the attempt.
 */
export class IntentStatusMapper {
  static toPaymentStatus(intentStatus: IntentStatus | string): PaymentStatus {
    if (intentStatus === IntentStatus.PROCESSING) {
      return PaymentStatus.PROCESSING;
    }
    if (intentStatus === IntentStatus.SUCCEEDED) {
      return PaymentStatus.SUCCESSFUL;
    }
    if (AWAITING_CUSTOMER.includes(intentStatus)) {
      return PaymentStatus.PENDING;
    }
    return PaymentStatus.CANCELED;
  }
}
