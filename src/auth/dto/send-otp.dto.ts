import { IsNotEmpty, Matches } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';
import { MOBILE_NUMBER_MESSAGE, MOBILE_NUMBER_PATTERN } from './mobile-number';

export class SendOtpDto {
  @ApiProperty({
    example: '+919876543210',
    description: 'Mobile number, 10 to 13 digits with an optional leading +',
  })
  @Matches(MOBILE_NUMBER_PATTERN, { message: MOBILE_NUMBER_MESSAGE })
  @IsNotEmpty()
  mobileNo!: string;
}
