import type { OtpRecord } from '../types/otp.types';
import type { OtpStorage } from './otp-storage.interface';

/**
 * Process-local OTP table used when the Supabase store cannot be reached.
 * Contents are lost on restart.
 */
export class InMemoryOtpStorage implements OtpStorage {
  readonly backend = 'memory' as const;

  private readonly records = new Map<string, OtpRecord[]>();
  private lock: Promise<void> = Promise.resolve();
  private nextId = 1;

  async put(
    phoneNumber: string,
    code: string,
    expiresAt: Date,
    createdAt: Date = new Date(),
  ): Promise<void> {
    await this.runExclusive(() => {
      const history = this.records.get(phoneNumber) ?? [];
      history.push({
        id: String(this.nextId++),
        phoneNumber,
        code,
        createdAt,
        expiresAt,
        isUsed: false,
      });
      this.records.set(phoneNumber, history);
    });
  }

  async getActive(phoneNumber: string): Promise<OtpRecord | null> {
    return this.runExclusive(() => {
      const record = this.findActive(phoneNumber);
      return record ? { ...record } : null;
    });
  }

  async markUsed(phoneNumber: string, recordId: string): Promise<void> {
    await this.runExclusive(() => {
      const record = (this.records.get(phoneNumber) ?? []).find(
        (candidate) => candidate.id === recordId,
      );
      if (record) {
        record.isUsed = true;
      }
    });
  }

  async hasActive(phoneNumber: string, now: Date = new Date()): Promise<boolean> {
    return this.runExclusive(() => {
      const record = this.findActive(phoneNumber);
      if (!record) {
        return false;
      }

      if (now.getTime() > record.expiresAt.getTime()) {
        record.isUsed = true;
        return false;
      }

      return true;
    });
  }

  /** Every record ever stored for the phone, oldest first. */
  async history(phoneNumber: string): Promise<OtpRecord[]> {
    return this.runExclusive(() =>
      (this.records.get(phoneNumber) ?? []).map((record) => ({ ...record })),
    );
  }

  // Records are appended in creation order. Only the newest one can be
  // active, so a superseded code is never brought back once its successor
  // is used.
  private findActive(phoneNumber: string): OtpRecord | undefined {
    const history = this.records.get(phoneNumber) ?? [];
    const latest = history.at(-1);
    return latest && !latest.isUsed ? latest : undefined;
  }

  // Serializes critical sections. The lock is held only while `task` runs,
  // never across an await on I/O.
  private runExclusive<T>(task: () => T): Promise<T> {
    const result = this.lock.then(task);
    this.lock = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}
