import { IntentStatus } from '../interfaces';
import { PaymentStatus } from '../models';
import { IntentStatusMapper } from './intent-status.mapper';

describe('IntentStatusMapper', () => {
  it.each([
    [IntentStatus.PROCESSING, PaymentStatus.PROCESSING],
    [IntentStatus.SUCCEEDED, PaymentStatus.SUCCESSFUL],
    [IntentStatus.REQUIRES_PAYMENT_METHOD, PaymentStatus.PENDING],
    [IntentStatus.REQUIRES_CONFIRMATION, PaymentStatus.PENDING],
    [IntentStatus.REQUIRES_ACTION, PaymentStatus.PENDING],
    [IntentStatus.CANCELED, PaymentStatus.CANCELED],
    [IntentStatus.REQUIRES_CAPTURE, PaymentStatus.CANCELED],
    ['something_new', PaymentStatus.CANCELED],
  ])('maps %s to %s', (intentStatus, expected) => {
    expect(IntentStatusMapper.toPaymentStatus(intentStatus)).toBe(expected);
  });
});
