import { InvalidPhoneNumberError } from '../otp.errors';

export const COUNTRY_CODE = '91';

/**
 * `+91`, then a subscriber part of 10 to 12 digits that does not start with 0.
 */
export const CANONICAL_PHONE_PATTERN = /^\+91[1-9]\d{9,11}$/;

/**
 * Converts a phone number written in any of the usual local formats
 * (spaces, dashes, parentheses, `+91`, trunk `0`) into `+91XXXXXXXXXX`.
 *
 * A 10 digit number that happens to start with `91` is a subscriber number,
 * not a country-code prefixed one, so `9173457840` becomes `+919173457840`.
 *
 * @throws InvalidPhoneNumberError when the result is not a canonical number.
 */
export function normalizePhoneNumber(input: string): string {
  let digits = (input ?? '').replace(/\D/g, '');

  if (digits.length === 10 && digits.startsWith(COUNTRY_CODE)) {
    digits = COUNTRY_CODE + digits;
  } else if (!digits.startsWith(COUNTRY_CODE)) {
    digits = COUNTRY_CODE + digits;
  }

  // trunk prefix left over from numbers written as 0XXXXXXXXXX
  if (digits.startsWith(`${COUNTRY_CODE}0`)) {
    digits = COUNTRY_CODE + digits.slice(COUNTRY_CODE.length + 1);
  }

  const normalized = `+${digits}`;
  if (!CANONICAL_PHONE_PATTERN.test(normalized)) {
    throw new InvalidPhoneNumberError();
  }

  return normalized;
}

/**
 * Gupshup expects the destination without the leading `+`.
 */
export function toWhatsAppDestination(phoneNumber: string): string {
  return phoneNumber.startsWith('+') ? phoneNumber.slice(1) : phoneNumber;
}
