import { Inject, Injectable, Logger } from '@nestjs/common';
import { OTP_CONFIG, OtpConfig } from '../../common/config/otp.config';
import {
  MESSAGE_DELIVERY,
  MessageDelivery,
} from '../whatsapp/interfaces/whatsapp-messaging.interface';
import {
  DeliveryFailedError,
  InvalidOtpError,
  InvalidOtpFormatError,
  OtpAlreadySentError,
  OtpError,
  OtpNotFoundError,
  StorageUnavailableError,
} from './otp.errors';
import { OTP_STORAGE, OtpStorage } from './storage/otp-storage.interface';
import type { OtpResponseData, OtpResult } from './types/otp.types';
import { normalizePhoneNumber } from './utils/phone.utils';

const OTP_PATTERN = /^\d{6}$/;

/**
 * Issues and verifies WhatsApp OTPs.
 *
 * Per phone number a code moves NONE → ISSUED → VERIFIED, or
 * NONE → ISSUED → EXPIRED once it is read after its TTL. Both terminal states
 * set `isUsed`; nothing is deleted.
 *
 * Every operation resolves to an {@link OtpResult}; failures never escape as
 * exceptions.
 */
@Injectable()
export class OtpService {
  private readonly logger = new Logger(OtpService.name);

  constructor(
    @Inject(OTP_STORAGE) private readonly storage: OtpStorage,
    @Inject(MESSAGE_DELIVERY) private readonly delivery: MessageDelivery,
    @Inject(OTP_CONFIG) private readonly config: OtpConfig,
  ) {}

  get storageBackend(): OtpStorage['backend'] {
    return this.storage.backend;
  }

  async send(phoneNumber: string): Promise<OtpResult> {
    return this.run(phoneNumber, async (normalized) => {
      if (this.config.blockDuplicateSend) {
        if (await this.storage.hasActive(normalized, this.now())) {
          throw new OtpAlreadySentError();
        }
      }
      return this.issue(normalized, 'OTP sent successfully');
    });
  }

  /**
   * Same as {@link send} without the duplicate check. The new record shadows
   * any earlier one for the phone.
   */
  async resend(phoneNumber: string): Promise<OtpResult> {
    return this.run(phoneNumber, (normalized) =>
      this.issue(normalized, 'OTP resent successfully'),
    );
  }

  async verify(phoneNumber: string, code: string): Promise<OtpResult> {
    return this.run(phoneNumber, async (normalized) => {
      const candidate = (code ?? '').trim();
      if (!OTP_PATTERN.test(candidate)) {
        throw new InvalidOtpFormatError();
      }

      const record = await this.storage.getActive(normalized);
      if (!record) {
        throw new OtpNotFoundError();
      }

      if (this.now().getTime() > record.expiresAt.getTime()) {
        await this.storage.markUsed(normalized, record.id);
        this.logger.log(`OTP for ${normalized} expired`);
        throw new OtpNotFoundError();
      }

      // A wrong code leaves the record untouched so the user can retry.
      if (record.code !== candidate) {
        throw new InvalidOtpError();
      }

      await this.storage.markUsed(normalized, record.id);
      this.logger.log(`OTP verified for ${normalized}`);
      return {
        success: true,
        message: 'OTP verified successfully',
        data: { phone_number: normalized },
      };
    });
  }

  /**
   * Six digits, uniform over 100000-999999. Not a security token.
   */
  generateCode(): string {
    return String(100_000 + Math.floor(Math.random() * 900_000));
  }

  protected now(): Date {
    return new Date();
  }

  private async issue(normalized: string, message: string): Promise<OtpResult> {
    const code = this.generateCode();
    const createdAt = this.now();
    const expiresAt = new Date(
      createdAt.getTime() + this.config.ttlMinutes * 60 * 1000,
    );

    await this.storage.put(normalized, code, expiresAt, createdAt);

    // The record is kept even when delivery fails.
    const delivery = await this.delivery.deliverTemplate(
      normalized,
      this.config.templateId,
      [code],
    );
    if (!delivery.success) {
      throw new DeliveryFailedError(delivery.error ?? 'OTP delivery failed');
    }

    this.logger.log(
      `OTP issued for ${normalized} (message ${delivery.messageId ?? 'n/a'}, storage ${this.storage.backend})`,
    );

    const data: OtpResponseData = { phone_number: normalized };
    if (this.config.exposeCode) {
      data.code = code;
    }
    return { success: true, message, data };
  }

  private async run(
    phoneNumber: string,
    operation: (normalized: string) => Promise<OtpResult>,
  ): Promise<OtpResult> {
    let normalized = phoneNumber;
    try {
      normalized = normalizePhoneNumber(phoneNumber);
      return await operation(normalized);
    } catch (error) {
      const failure =
        error instanceof OtpError
          ? error
          : new StorageUnavailableError(
              `OTP storage error: ${(error as Error).message}`,
            );

      if (failure.code === 'DELIVERY_FAILED' || failure.code === 'STORAGE_UNAVAILABLE') {
        this.logger.error(`${failure.message} (phone ${normalized})`);
      } else {
        this.logger.debug(`${failure.code} for ${normalized}`);
      }

      return {
        success: false,
        message: failure.message,
        error: failure.code,
        data: { phone_number: normalized },
      };
    }
  }
}
