import { IsNotEmpty, Matches } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';
import { MOBILE_NUMBER_MESSAGE, MOBILE_NUMBER_PATTERN } from './mobile-number';

export class VerifyOtpDto {
  @ApiProperty({ example: '+919876543210' })
  @Matches(MOBILE_NUMBER_PATTERN, { message: MOBILE_NUMBER_MESSAGE })
  @IsNotEmpty()
  mobileNo!: string;

  @ApiProperty({ example: '123456', description: 'Numeric OTP code' })
  @Matches(/^\d{4,8}$/, { message: 'otp must be a numeric code' })
  @IsNotEmpty()
  otp!: string;
}
