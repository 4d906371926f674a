import { Transform } from 'class-transformer';
import { IsOptional, IsString, Matches } from 'class-validator';
import { MONEY_PATTERN } from '../../../core/utils/money.util';

export class RefundPaymentDto {
  /** Partial refund amount; the whole payment is refunded when omitted. */
  @IsOptional()
  @Transform(({ value }) => (typeof value === 'number' ? String(value) : value))
  @IsString()
  @Matches(MONEY_PATTERN, {
    message: 'amount must be a decimal with at most two fraction digits',
  })
  amount?: string;
}
