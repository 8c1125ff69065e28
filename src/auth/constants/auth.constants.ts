/**
 * Redis key prefixes and client-facing messages shared by the auth services.
 */
export const AUTH_CONSTANTS = {
  REDIS_KEYS: {
    /** Pending OTP record, one per mobile number */
    OTP: 'otp:mobile:',
    /** Set after a successful verify-otp, consumed by registration */
    VERIFIED: 'otp:verified:',
    SEND_COOLDOWN: 'otp:send:cooldown:',
    VERIFY_ATTEMPTS: 'otp:verify:attempts:',
  },

  MESSAGES: {
    OTP_SENT: 'OTP sent successfully',
    OTP_VERIFIED: 'OTP verified successfully',
    OTP_NOT_FOUND: 'OTP not found or expired',
    OTP_EXPIRED: 'OTP has expired',
    OTP_INVALID: 'Invalid OTP',
    OTP_COOLDOWN: 'Please wait before requesting another OTP',
    OTP_TOO_MANY_ATTEMPTS: 'Too many OTP verification attempts',
    SMS_CONFIGURATION_ERROR: 'Twilio configuration error',
    SMS_SEND_FAILED_PREFIX: 'Failed to send OTP: ',
    USERNAME_TAKEN: 'Username already exists',
    MOBILE_TAKEN: 'Mobile number already exists',
    BAD_CREDENTIALS: 'Incorrect username/mobileNo or password',
    INVALID_SESSION: 'Could not validate credentials',
    LOGGED_OUT: 'Logged out successfully',
  },
} as const;
