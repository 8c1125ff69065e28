export const MOBILE_NUMBER_PATTERN = /^\+?\d{10,13}$/;

export const MOBILE_NUMBER_MESSAGE = 'mobileNo must be 10 to 13 digits, optionally with a leading +';
