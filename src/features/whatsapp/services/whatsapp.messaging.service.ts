import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpService } from '@nestjs/axios';
import { firstValueFrom } from 'rxjs';
import {
  GupshupConfig,
  loadGupshupConfig,
} from '../../../common/config/otp.config';
import { toWhatsAppDestination } from '../../otp/utils/phone.utils';
import {
  DeliveryResult,
  GupshupSubmitResponse,
  GupshupTemplatePayload,
  MessageDelivery,
} from '../interfaces/whatsapp-messaging.interface';

const REQUEST_TIMEOUT_MS = 30_000;

/**
 * Sends WhatsApp template messages through the Gupshup API.
 */
@Injectable()
export class WhatsAppMessagingService implements MessageDelivery {
  private readonly logger = new Logger(WhatsAppMessagingService.name);
  private readonly gupshup: GupshupConfig;

  constructor(
    private readonly config: ConfigService,
    private readonly http: HttpService,
  ) {
    this.gupshup = loadGupshupConfig(this.config);
  }

  isConfigured(): boolean {
    return Boolean(this.gupshup.apiKey && this.gupshup.source);
  }

  /**
   * Common headers for Gupshup calls; the API key travels as `apikey`.
   */
  private getHeaders() {
    return {
      apikey: this.gupshup.apiKey,
      'Cache-Control': 'no-cache',
      'Content-Type': 'application/x-www-form-urlencoded',
    };
  }

  // =========================================================================
  // TEMPLATES
  // =========================================================================
  async deliverTemplate(
    phoneNumber: string,
    templateId: string,
    params: string[],
  ): Promise<DeliveryResult> {
    if (!this.isConfigured()) {
      this.logger.error(
        'Gupshup is not configured. Set GUPSHUP_API_KEY and GUPSHUP_SOURCE to deliver WhatsApp messages.',
      );
      return { success: false, error: 'Gupshup is not configured' };
    }

    const template: GupshupTemplatePayload = { id: templateId, params };
    const form = new URLSearchParams({
      channel: 'whatsapp',
      source: this.gupshup.source,
      destination: toWhatsAppDestination(phoneNumber),
      'src.name': this.gupshup.otpSourceName,
      template: JSON.stringify(template),
    });

    try {
      const response = await firstValueFrom(
        this.http.post<GupshupSubmitResponse | string>(
          this.gupshup.templateUrl,
          form.toString(),
          {
            headers: this.getHeaders(),
            timeout: REQUEST_TIMEOUT_MS,
            // Gupshup answers 202 on accepted submissions
            validateStatus: () => true,
          },
        ),
      );

      if (response.status !== 200 && response.status !== 202) {
        const details =
          typeof response.data === 'string'
            ? response.data
            : JSON.stringify(response.data);
        this.logger.error(
          `Template ${templateId} rejected for ${phoneNumber}: ${response.status} - ${details}`,
        );
        return {
          success: false,
          error: `Failed to send message. Status: ${response.status}`,
        };
      }

      const messageId =
        typeof response.data === 'object' && response.data !== null
          ? response.data.messageId
          : undefined;
      this.logger.debug(`Template ${templateId} submitted to ${phoneNumber}`);
      return { success: true, messageId };
    } catch (error) {
      const message = (error as Error).message;
      this.logger.error(`Error sending template ${templateId}: ${message}`);
      return { success: false, error: `Error sending message: ${message}` };
    }
  }
}
