import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { ConfigModule } from '@nestjs/config';
import { MESSAGE_DELIVERY } from './interfaces/whatsapp-messaging.interface';
import { WhatsAppMessagingService } from './services/whatsapp.messaging.service';

@Module({
  imports: [ConfigModule, HttpModule],
  providers: [
    WhatsAppMessagingService,
    { provide: MESSAGE_DELIVERY, useExisting: WhatsAppMessagingService },
  ],
  exports: [WhatsAppMessagingService, MESSAGE_DELIVERY],
})
export class WhatsappMessagingModule {}
