import { Logger } from '@nestjs/common';

/**
 * Common contract for OTP delivery channels.
 */
export abstract class BaseSmsProvider {
  protected readonly logger: Logger;

  constructor(loggerContext: string) {
    this.logger = new Logger(loggerContext);
  }

  /**
   * @throws SmsConfigurationError when the provider cannot be used
   * @throws SmsDeliveryError when the provider fails the send
   */
  abstract sendOtpSms(mobileNo: string, code: string): Promise<void>;

  protected formatOtpMessage(code: string): string {
    return `Your Jewelify OTP is ${code}`;
  }

  protected validateMobileNumber(mobileNo: string): boolean {
    return /^\+?\d{10,13}$/.test(mobileNo);
  }

  protected validateOtpCode(code: string): boolean {
    return /^\d{4,}$/.test(code);
  }
}
