/**
 * Raised when real delivery is enabled but the provider credentials are incomplete.
 */
export class SmsConfigurationError extends Error {
  constructor(message = 'Twilio configuration error') {
    super(message);
    this.name = 'SmsConfigurationError';
  }
}

/**
 * Raised when the provider rejects or fails a send. `message` is the provider's own.
 */
export class SmsDeliveryError extends Error {
  constructor(
    message: string,
    readonly providerCode?: string | number,
  ) {
    super(message);
    this.name = 'SmsDeliveryError';
  }
}
