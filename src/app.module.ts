import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { HealthModule } from './features/health/health.module';
import { OtpModule } from './features/otp/otp.module';

@Module({
  imports: [ConfigModule.forRoot({ isGlobal: true }), OtpModule, HealthModule],
})
export class AppModule {}
