import { IsNotEmpty, IsString, Length, Matches, MinLength } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';
import { MOBILE_NUMBER_MESSAGE, MOBILE_NUMBER_PATTERN } from './mobile-number';

export class RegisterDto {
  @ApiProperty({ example: 'asha', minLength: 3, maxLength: 50 })
  @IsString()
  @Length(3, 50)
  username!: string;

  @ApiProperty({ example: '+919876543210' })
  @Matches(MOBILE_NUMBER_PATTERN, { message: MOBILE_NUMBER_MESSAGE })
  @IsNotEmpty()
  mobileNo!: string;

  @ApiProperty({ example: 'change-me', minLength: 6 })
  @IsString()
  @MinLength(6)
  password!: string;

  @ApiProperty({
    example: '123456',
    description: 'OTP sent to mobileNo; ignored when the number was already verified',
  })
  @Matches(/^\d{4,8}$/, { message: 'otp must be a numeric code' })
  @IsNotEmpty()
  otp!: string;
}
