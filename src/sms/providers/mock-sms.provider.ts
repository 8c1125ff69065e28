import { BaseSmsProvider } from './base-sms.provider';
import { SmsDeliveryError } from '../sms.errors';

/**
 * Sandbox provider: logs the message instead of sending it.
 */
export class MockSmsProvider extends BaseSmsProvider {
  constructor() {
    super('MockSmsProvider');
  }

  async sendOtpSms(mobileNo: string, code: string): Promise<void> {
    if (!this.validateMobileNumber(mobileNo)) {
      throw new SmsDeliveryError(`Invalid mobile number format: ${mobileNo}`);
    }
    if (!this.validateOtpCode(code)) {
      throw new SmsDeliveryError('Invalid OTP code format');
    }

    this.logger.log(`[SMS MOCK] To: ${mobileNo} Message: ${this.formatOtpMessage(code)}`);
  }
}
