/**
 * Body returned by the Gupshup template API on an accepted submission.
 */
export interface GupshupSubmitResponse {
  status?: string;
  messageId?: string;
  message?: string;
}

/**
 * Template reference serialized into the `template` form field.
 */
export interface GupshupTemplatePayload {
  id: string;
  params: string[];
}

export interface DeliveryResult {
  success: boolean;
  messageId?: string;
  /** Human readable reason when `success` is false. */
  error?: string;
}

export const MESSAGE_DELIVERY = Symbol('MESSAGE_DELIVERY');

/**
 * Sends a WhatsApp template message. Implementations report failures through
 * the result instead of throwing.
 */
export interface MessageDelivery {
  deliverTemplate(
    phoneNumber: string,
    templateId: string,
    params: string[],
  ): Promise<DeliveryResult>;
}
