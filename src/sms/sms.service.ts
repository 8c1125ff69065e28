import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { BaseSmsProvider } from './providers/base-sms.provider';
import { MockSmsProvider } from './providers/mock-sms.provider';
import { TwilioSmsProvider } from './providers/twilio-sms.provider';

export interface ISmsProvider {
  sendOtpSms(mobileNo: string, code: string): Promise<void>;
}

/**
 * Picks the sandbox or the Twilio provider from `sms.sandbox` once, at construction.
 */
@Injectable()
export class SmsService implements ISmsProvider {
  private readonly logger = new Logger(SmsService.name);
  private readonly smsProvider: BaseSmsProvider;

  constructor(private configService: ConfigService) {
    if (this.configService.get<boolean>('sms.sandbox')) {
      this.smsProvider = new MockSmsProvider();
      this.logger.log('SMS Service initialized with MockSmsProvider (sandbox mode)');
    } else {
      this.smsProvider = new TwilioSmsProvider(this.configService);
      this.logger.log('SMS Service initialized with TwilioSmsProvider');
    }
  }

  get isSandbox(): boolean {
    return this.smsProvider instanceof MockSmsProvider;
  }

  async sendOtpSms(mobileNo: string, code: string): Promise<void> {
    try {
      await this.smsProvider.sendOtpSms(mobileNo, code);
    } catch (error) {
      this.logger.error(`Failed to send OTP SMS to ***${mobileNo.slice(-4)}:`, error);
      throw error;
    }
  }
}
