import { Module } from '@nestjs/common';
import { OtpModule } from '../otp/otp.module';
import { HealthController } from './health.controller';

@Module({
  imports: [OtpModule],
  controllers: [HealthController],
})
export class HealthModule {}
