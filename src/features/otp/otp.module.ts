import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import {
  OTP_CONFIG,
  OtpConfig,
  loadOtpConfig,
} from '../../common/config/otp.config';
import { InfrastructureModule } from '../../common/infrastructure/infrastructure.module';
import { SupabaseService } from '../../common/infrastructure/supabase/supabase.service';
import { WhatsappMessagingModule } from '../whatsapp/whatsapp-messaging.module';
import { OtpController } from './otp.controller';
import { OtpService } from './otp.service';
import { OTP_STORAGE } from './storage/otp-storage.interface';
import { selectOtpStorage } from './storage/otp-storage.selector';
import { SupabaseOtpStorage } from './storage/supabase-otp.storage';

@Module({
  imports: [ConfigModule, InfrastructureModule, WhatsappMessagingModule],
  controllers: [OtpController],
  providers: [
    {
      provide: OTP_CONFIG,
      useFactory: (config: ConfigService): OtpConfig => loadOtpConfig(config),
      inject: [ConfigService],
    },
    {
      // Resolved once at startup; no reconnection to the primary afterwards.
      provide: OTP_STORAGE,
      useFactory: (supabase: SupabaseService, config: OtpConfig) =>
        selectOtpStorage({
          primaryConfigured: Boolean(config.primaryStoreUrl),
          primaryFactory: () => SupabaseOtpStorage.connect(supabase),
        }),
      inject: [SupabaseService, OTP_CONFIG],
    },
    OtpService,
  ],
  exports: [OtpService, OTP_CONFIG],
})
export class OtpModule {}
