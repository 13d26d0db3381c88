import { Controller, Get, Inject } from '@nestjs/common';
import { ApiOkResponse, ApiOperation, ApiTags } from '@nestjs/swagger';
import { OTP_CONFIG, OtpConfig } from '../../common/config/otp.config';
import { OtpService } from '../otp/otp.service';
import type { OtpStorageBackend } from '../otp/storage/otp-storage.interface';

export const SERVICE_NAME = 'WhatsApp OTP API';
export const SERVICE_VERSION = '1.0.0';

export interface HealthStatus {
  status: 'healthy' | 'degraded';
  timestamp: string;
  service: string;
  version: string;
  otp_storage: {
    backend: OtpStorageBackend;
    primary_configured: boolean;
  };
}

@ApiTags('health')
@Controller('health')
export class HealthController {
  constructor(
    private readonly otp: OtpService,
    @Inject(OTP_CONFIG) private readonly config: OtpConfig,
  ) {}

  @Get()
  @ApiOperation({ summary: 'Reports service status and the active OTP store' })
  @ApiOkResponse({ description: 'Degraded while the in-memory store is active' })
  check(): HealthStatus {
    const backend = this.otp.storageBackend;
    return {
      status: backend === 'supabase' ? 'healthy' : 'degraded',
      timestamp: new Date().toISOString(),
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      otp_storage: {
        backend,
        primary_configured: Boolean(this.config.primaryStoreUrl),
      },
    };
  }
}
