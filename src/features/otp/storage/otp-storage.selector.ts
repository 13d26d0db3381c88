import { Logger } from '@nestjs/common';
import { InMemoryOtpStorage } from './in-memory-otp.storage';
import type { OtpStorage } from './otp-storage.interface';

export interface OtpStorageSelectionOptions {
  primaryConfigured: boolean;
  /** Builds the primary store; must throw when it is not usable. */
  primaryFactory: () => Promise<OtpStorage>;
  logger?: Logger;
}

/**
 * Picks the OTP store once, at startup. The primary store is used when it
 * can be built; otherwise the in-memory store takes its place for the rest
 * of the process lifetime.
 */
export async function selectOtpStorage(
  options: OtpStorageSelectionOptions,
): Promise<OtpStorage> {
  const logger = options.logger ?? new Logger('OtpStorageSelector');

  if (!options.primaryConfigured) {
    logger.warn('Primary OTP store not configured, using in-memory storage');
    return new InMemoryOtpStorage();
  }

  try {
    const storage = await options.primaryFactory();
    logger.log(`OTP storage ready (${storage.backend})`);
    return storage;
  } catch (error) {
    logger.warn(
      `Could not initialize primary OTP storage: ${(error as Error).message}. Falling back to in-memory storage`,
    );
    return new InMemoryOtpStorage();
  }
}
