import { HttpStatus } from '@nestjs/common';

export type OtpErrorCode =
  | 'INVALID_PHONE_NUMBER'
  | 'INVALID_OTP_FORMAT'
  | 'NOT_FOUND'
  | 'INVALID_OTP'
  | 'OTP_ALREADY_SENT'
  | 'DELIVERY_FAILED'
  | 'STORAGE_UNAVAILABLE';

/**
 * HTTP status used by the API layer for each failure of the OTP lifecycle.
 */
export const OTP_ERROR_STATUS: Record<OtpErrorCode, HttpStatus> = {
  INVALID_PHONE_NUMBER: HttpStatus.BAD_REQUEST,
  INVALID_OTP_FORMAT: HttpStatus.BAD_REQUEST,
  INVALID_OTP: HttpStatus.BAD_REQUEST,
  NOT_FOUND: HttpStatus.NOT_FOUND,
  OTP_ALREADY_SENT: HttpStatus.CONFLICT,
  DELIVERY_FAILED: HttpStatus.INTERNAL_SERVER_ERROR,
  STORAGE_UNAVAILABLE: HttpStatus.INTERNAL_SERVER_ERROR,
};

export class OtpError extends Error {
  constructor(
    readonly code: OtpErrorCode,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidPhoneNumberError extends OtpError {
  constructor(message = 'Invalid phone number format') {
    super('INVALID_PHONE_NUMBER', message);
  }
}

export class InvalidOtpFormatError extends OtpError {
  constructor(message = 'OTP must be a 6 digit code') {
    super('INVALID_OTP_FORMAT', message);
  }
}

// Expired and missing codes share this error so callers cannot tell them apart.
export class OtpNotFoundError extends OtpError {
  constructor(message = 'OTP not found or expired') {
    super('NOT_FOUND', message);
  }
}

export class InvalidOtpError extends OtpError {
  constructor(message = 'Invalid OTP') {
    super('INVALID_OTP', message);
  }
}

export class OtpAlreadySentError extends OtpError {
  constructor(
    message = 'OTP already sent. Please wait for expiry or use resend endpoint.',
  ) {
    super('OTP_ALREADY_SENT', message);
  }
}

export class DeliveryFailedError extends OtpError {
  constructor(message = 'OTP delivery failed') {
    super('DELIVERY_FAILED', message);
  }
}

export class StorageUnavailableError extends OtpError {
  constructor(message = 'OTP storage unavailable') {
    super('STORAGE_UNAVAILABLE', message);
  }
}
