import {
  IsEmail,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Matches,
  MaxLength,
  Min,
} from 'class-validator';

export class InitiatePaymentDto {
  @IsString({ message: 'merchantId must be a string' })
  @IsNotEmpty({ message: 'merchantId is required' })
  @MaxLength(50, { message: 'merchantId must not exceed 50 characters' })
  merchantId!: string;

  @IsString({ message: 'orderId must be a string' })
  @IsNotEmpty({ message: 'orderId is required' })
  @MaxLength(100, { message: 'orderId must not exceed 100 characters' })
  orderId!: string;

  @IsNumber({ maxDecimalPlaces: 2 }, { message: 'amount must be a number with at most 2 decimals' })
  @Min(0.01, { message: 'amount must be at least 0.01' })
  amount!: number;

  @IsString({ message: 'productInfo must be a string' })
  @IsNotEmpty({ message: 'productInfo is required' })
  @MaxLength(255, { message: 'productInfo must not exceed 255 characters' })
  productInfo!: string;

  @IsString({ message: 'firstName must be a string' })
  @IsNotEmpty({ message: 'firstName is required' })
  @MaxLength(100, { message: 'firstName must not exceed 100 characters' })
  firstName!: string;

  @IsEmail({}, { message: 'email must be a valid email address' })
  email!: string;

  @Matches(/^[0-9]{10}$/, { message: 'phone must be a 10-digit number' })
  phone!: string;

  @IsOptional()
  @Matches(/^[A-Za-z0-9_-]{1,40}$/, {
    message: 'txnid may only contain letters, digits, "_" and "-" (max 40)',
  })
  txnid?: string;

  @IsOptional()
  @IsString({ message: 'udf3 must be a string' })
  @MaxLength(255)
  udf3?: string;

  @IsOptional()
  @IsString({ message: 'udf4 must be a string' })
  @MaxLength(255)
  udf4?: string;

  @IsOptional()
  @IsString({ message: 'udf5 must be a string' })
  @MaxLength(255)
  udf5?: string;

  @IsOptional()
  @IsString({ message: 'udf6 must be a string' })
  @MaxLength(255)
  udf6?: string;

  @IsOptional()
  @IsString({ message: 'udf7 must be a string' })
  @MaxLength(255)
  udf7?: string;

  @IsOptional()
  @IsString({ message: 'udf8 must be a string' })
  @MaxLength(255)
  udf8?: string;

  @IsOptional()
  @IsString({ message: 'udf9 must be a string' })
  @MaxLength(255)
  udf9?: string;

  @IsOptional()
  @IsString({ message: 'udf10 must be a string' })
  @MaxLength(255)
  udf10?: string;

  /** SHA-256 of merchantId + orderId + amount + merchantSalt, no separator, amount with two decimals. */
  @IsString({ message: 'hash must be a string' })
  @Matches(/^[0-9a-fA-F]{64}$/, { message: 'hash must be a 64-character hex digest' })
  hash!: string;
}
