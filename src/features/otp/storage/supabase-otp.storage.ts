import { Logger } from '@nestjs/common';
import type { SupabaseService } from '../../../common/infrastructure/supabase/supabase.service';
import { StorageUnavailableError } from '../otp.errors';
import type { DbOtpRow, OtpRecord } from '../types/otp.types';
import type { OtpStorage } from './otp-storage.interface';

export type SupabaseQueryClient = Pick<SupabaseService, 'isEnabled' | 'query'>;

const TABLE = 'otp_storage';

/**
 * OTP records in the Supabase `otp_storage` table (see sql/otp_storage.sql).
 */
export class SupabaseOtpStorage implements OtpStorage {
  readonly backend = 'supabase' as const;
  private readonly logger = new Logger(SupabaseOtpStorage.name);

  private constructor(private readonly supabase: SupabaseQueryClient) {}

  /**
   * Builds the store after checking that the table answers. Throws
   * StorageUnavailableError otherwise, so the caller can fall back.
   */
  static async connect(
    supabase: SupabaseQueryClient,
  ): Promise<SupabaseOtpStorage> {
    if (!supabase.isEnabled()) {
      throw new StorageUnavailableError('Supabase connection is not configured');
    }

    try {
      await supabase.query(`select id from ${TABLE} limit 1`);
    } catch (error) {
      throw new StorageUnavailableError(
        `Table ${TABLE} is not reachable: ${(error as Error).message}`,
      );
    }

    return new SupabaseOtpStorage(supabase);
  }

  async put(
    phoneNumber: string,
    code: string,
    expiresAt: Date,
    createdAt: Date = new Date(),
  ): Promise<void> {
    await this.supabase.query(
      `
        insert into ${TABLE} (phone_number, otp, created_at, expires_at, is_used)
        values ($1, $2, $3, $4, false)
      `,
      [phoneNumber, code, createdAt, expiresAt],
    );
  }

  async getActive(phoneNumber: string): Promise<OtpRecord | null> {
    const row = await this.getLatestRow(phoneNumber);
    if (!row || row.is_used) {
      return null;
    }
    return this.mapRowToRecord(row);
  }

  async markUsed(phoneNumber: string, recordId: string): Promise<void> {
    await this.markRowUsed(recordId, phoneNumber);
  }

  async hasActive(phoneNumber: string, now: Date = new Date()): Promise<boolean> {
    const record = await this.getLatestRow(phoneNumber);
    if (!record || record.is_used) {
      return false;
    }

    if (now.getTime() > this.parseTimestamp(record.expires_at).getTime()) {
      this.logger.debug(`Latest OTP for ${phoneNumber} expired, marking as used`);
      await this.markRowUsed(record.id, phoneNumber);
      return false;
    }

    return true;
  }

  // Only the newest row of a phone can be active; older unused rows stay
  // shadowed for audit.
  private async getLatestRow(phoneNumber: string): Promise<DbOtpRow | null> {
    const rows = await this.supabase.query<DbOtpRow>(
      `
        select id, phone_number, otp, created_at, expires_at, is_used
        from ${TABLE}
        where phone_number = $1
        order by created_at desc, id desc
        limit 1
      `,
      [phoneNumber],
    );

    return rows[0] ?? null;
  }

  private async markRowUsed(id: string, phoneNumber: string): Promise<void> {
    await this.supabase.query(
      `
        update ${TABLE}
        set is_used = true
        where id = $1 and phone_number = $2 and is_used = false
      `,
      [id, phoneNumber],
    );
  }

  private mapRowToRecord(row: DbOtpRow): OtpRecord {
    return {
      id: String(row.id),
      phoneNumber: row.phone_number,
      code: row.otp,
      createdAt: this.parseTimestamp(row.created_at),
      expiresAt: this.parseTimestamp(row.expires_at),
      isUsed: row.is_used,
    };
  }

  private parseTimestamp(value: Date | string): Date {
    return value instanceof Date ? value : new Date(value);
  }
}
