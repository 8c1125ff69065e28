import { ConfigService } from '@nestjs/config';
import { Twilio } from 'twilio';
import { BaseSmsProvider } from './base-sms.provider';
import { SmsConfigurationError, SmsDeliveryError } from '../sms.errors';

/**
 * Delivers OTP codes through the Twilio Messages API. One attempt per code:
 * no retry and no delivery receipt tracking.
 */
export class TwilioSmsProvider extends BaseSmsProvider {
  private readonly client?: Twilio;
  private readonly fromNumber?: string;

  constructor(configService: ConfigService) {
    super('TwilioSmsProvider');

    const accountSid = configService.get<string>('twilio.accountSid');
    const authToken = configService.get<string>('twilio.authToken');
    this.fromNumber = configService.get<string>('twilio.phoneNumber');

    if (accountSid && authToken) {
      this.client = new Twilio(accountSid, authToken);
    } else {
      this.logger.warn('Twilio credentials are missing. OTP delivery is disabled.');
    }
  }

  async sendOtpSms(mobileNo: string, code: string): Promise<void> {
    if (!this.client || !this.fromNumber) {
      throw new SmsConfigurationError();
    }

    try {
      const message = await this.client.messages.create({
        body: this.formatOtpMessage(code),
        from: this.fromNumber,
        to: mobileNo,
      });
      this.logger.log(`OTP message ${message.sid} queued for ${mobileNo.slice(-4)}`);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      const providerCode = readProviderCode(error);
      this.logger.error(`Twilio rejected OTP message: ${reason}`);
      throw new SmsDeliveryError(reason, providerCode);
    }
  }
}

function readProviderCode(error: unknown): string | number | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    if (typeof code === 'string' || typeof code === 'number') {
      return code;
    }
  }
  return undefined;
}
