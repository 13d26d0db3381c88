import { ConfigService } from '@nestjs/config';

export interface OtpConfig {
  ttlMinutes: number;
  primaryStoreUrl?: string;
  primaryStoreCredential?: string;
  /** Gupshup template carrying the code as its only parameter. */
  templateId: string;
  /** Rejects `send` with 409 while an unexpired code exists for the phone. */
  blockDuplicateSend: boolean;
  /** Echoes the generated code in the send/resend response. Development only. */
  exposeCode: boolean;
}

export interface GupshupConfig {
  templateUrl: string;
  apiKey: string;
  source: string;
  otpSourceName: string;
}

export const OTP_CONFIG = Symbol('OTP_CONFIG');

export const DEFAULT_OTP_TTL_MINUTES = 3;
export const DEFAULT_GUPSHUP_TEMPLATE_URL =
  'https://api.gupshup.io/wa/api/v1/template/msg';

const PRIMARY_STORE_URL_KEYS = [
  'SUPABASE_DB_URL',
  'POSTGRES_URL',
  'POSTGRES_URL_NON_POOLING',
];

export function loadOtpConfig(config: ConfigService): OtpConfig {
  const primaryStoreUrl = PRIMARY_STORE_URL_KEYS.map((key) =>
    config.get<string>(key)?.trim(),
  ).find((value): value is string => Boolean(value));

  return {
    ttlMinutes: readPositiveInt(
      config.get<string>('OTP_EXPIRY_MINUTES'),
      DEFAULT_OTP_TTL_MINUTES,
    ),
    primaryStoreUrl,
    primaryStoreCredential:
      config.get<string>('SUPABASE_DB_PASSWORD')?.trim() || undefined,
    templateId: config.get<string>('GUPSHUP_WHATSAPP_OTP_TEMPLATE_ID', ''),
    blockDuplicateSend: readFlag(config.get<string>('OTP_BLOCK_DUPLICATE_SEND')),
    exposeCode: readFlag(config.get<string>('OTP_EXPOSE_CODE')),
  };
}

export function loadGupshupConfig(config: ConfigService): GupshupConfig {
  return {
    templateUrl: config.get<string>(
      'GUPSHUP_API_TEMPLATE_URL',
      DEFAULT_GUPSHUP_TEMPLATE_URL,
    ),
    apiKey: config.get<string>('GUPSHUP_API_KEY', ''),
    source: config.get<string>('GUPSHUP_SOURCE', ''),
    otpSourceName: config.get<string>('GUPSHUP_WHATSAPP_OTP_SRC_NAME', 'HomiAi'),
  };
}

export function readPositiveInt(
  raw: string | undefined,
  fallback: number,
): number {
  const value = Number(raw);
  return Number.isInteger(value) && value > 0 ? value : fallback;
}

function readFlag(raw: string | undefined): boolean {
  return raw?.trim().toLowerCase() === 'true';
}
