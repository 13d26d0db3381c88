import type { OtpErrorCode } from '../otp.errors';

export interface OtpRecord {
  /** Store-assigned identity; the row id in Postgres. */
  id: string;
  phoneNumber: string;
  code: string;
  createdAt: Date;
  expiresAt: Date;
  isUsed: boolean;
}

export interface DbOtpRow {
  id: string;
  phone_number: string;
  otp: string;
  created_at: Date | string;
  expires_at: Date | string;
  is_used: boolean;
}

export interface OtpResponseData {
  phone_number: string;
  /** Only present when OTP_EXPOSE_CODE is enabled (development). */
  code?: string;
}

export interface OtpSuccess {
  success: true;
  message: string;
  data: OtpResponseData;
}

export interface OtpFailure {
  success: false;
  message: string;
  error: OtpErrorCode;
  data: OtpResponseData;
}

export type OtpResult = OtpSuccess | OtpFailure;
