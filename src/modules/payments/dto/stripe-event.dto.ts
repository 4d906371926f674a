import { Type } from 'class-transformer';
import {
  IsDefined,
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';

export class StripePaymentErrorDto {
  @IsOptional()
  @IsString()
  message?: string;
}

export class StripeEventObjectDto {
  @IsString()
  @IsNotEmpty()
  id!: string;

  @IsOptional()
  @ValidateNested()
  @Type(() => StripePaymentErrorDto)
  last_payment_error?: StripePaymentErrorDto | null;
}

export class StripeEventDataDto {
  @IsDefined()
  @IsObject()
  @ValidateNested()
  @Type(() => StripeEventObjectDto)
  object!: StripeEventObjectDto;
}

/** The subset of a Stripe event envelope the webhook acts on. */
export class StripeEventDto {
  @IsString()
  @IsNotEmpty()
  id!: string;

  @IsString()
  @IsNotEmpty()
  type!: string;

  @IsDefined()
  @IsObject()
  @ValidateNested()
  @Type(() => StripeEventDataDto)
  data!: StripeEventDataDto;
}
