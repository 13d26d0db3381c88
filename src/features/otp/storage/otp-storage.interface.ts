import type { OtpRecord } from '../types/otp.types';

export const OTP_STORAGE = Symbol('OTP_STORAGE');

export type OtpStorageBackend = 'supabase' | 'memory';

/**
 * Persistence for OTP records. Records are never deleted; `isUsed` is the
 * terminal marker for both consumed and expired codes.
 */
export interface OtpStorage {
  readonly backend: OtpStorageBackend;

  /**
   * Adds a new record. Earlier records for the phone are left untouched.
   * `createdAt` defaults to the current time.
   */
  put(
    phoneNumber: string,
    code: string,
    expiresAt: Date,
    createdAt?: Date,
  ): Promise<void>;

  /**
   * Latest unused record for the phone, expired or not. Expiry is checked by
   * the caller.
   */
  getActive(phoneNumber: string): Promise<OtpRecord | null>;

  /**
   * Flags the record with the given id as used. A record stored after it was
   * read keeps its state.
   */
  markUsed(phoneNumber: string, recordId: string): Promise<void>;

  /**
   * Whether an unused, unexpired record exists. An expired latest record is
   * marked used on the way.
   */
  hasActive(phoneNumber: string, now?: Date): Promise<boolean>;
}
