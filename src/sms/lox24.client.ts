/**
 * LOX24 SMS Gateway Client
 *
 * Sends a single SMS through POST /sms on the LOX24 REST API and maps the
 * response onto a DispatchResult. Only HTTP 201 counts as sent.
 */

import { SenderConfig } from '../config';
import { maskCode, maskGatewayBody, maskPhoneNumber } from '../utils/masking';
import { smsFormatter } from './sms.formatter';
import { DispatchResult, Lox24SmsRequest, SendSmsOptions } from './sms.types';

export const LOX24_SMS_PATH = '/sms';
export const LOX24_AUTH_HEADER = 'X-LOX24-AUTH-TOKEN';
export const LOX24_TIMEOUT_MS = 10000;
export const LOX24_TIMEOUT_MESSAGE = 'LOX24 API request timeout';

const ERROR_MESSAGES: Record<number, string> = {
  400: 'Invalid input - Check phone number format and message content',
  401: 'Authentication failed - LOX24 API token is invalid or inactive',
  402: 'Insufficient funds - Please add credit to your LOX24 account',
  403: 'Account not activated - Please contact LOX24 support',
  404: 'API endpoint not found',
  429: 'Rate limit exceeded - Too many requests',
  500: 'LOX24 API internal error',
  503: 'LOX24 API temporarily unavailable',
};

/**
 * Map a LOX24 status code to a readable error message
 */
export const getLox24ErrorMessage = (statusCode: number): string =>
  ERROR_MESSAGES[statusCode] ?? 'Unexpected error from LOX24 API';

export interface SmsGateway {
  send(phoneNumber: string, message: string, options?: SendSmsOptions): Promise<DispatchResult>;
}

export class Lox24Client implements SmsGateway {
  private config: Pick<SenderConfig, 'lox24' | 'debugLogging'>;

  constructor(config: Pick<SenderConfig, 'lox24' | 'debugLogging'>) {
    this.config = config;
  }

  buildRequest(phoneNumber: string, message: string, options: SendSmsOptions = {}): Lox24SmsRequest {
    const { lox24 } = this.config;

    return {
      sender_id: options.senderId || lox24.senderId,
      text: message,
      service_code: options.serviceCode || lox24.serviceCode,
      phone: phoneNumber,
      is_unicode: smsFormatter.containsUnicode(message),
      ...(options.callbackData ? { callback_data: options.callbackData } : {}),
      ...(options.deliveryAt ? { delivery_at: options.deliveryAt } : {}),
      ...(options.voiceLang ? { voice_lang: options.voiceLang } : {}),
    };
  }

  /**
   * Send an SMS. Never throws: transport errors and the 10 second timeout come
   * back as failures with a null status code.
   */
  async send(phoneNumber: string, message: string, options: SendSmsOptions = {}): Promise<DispatchResult> {
    const payload = this.buildRequest(phoneNumber, message, options);
    const body = JSON.stringify(payload);

    if (this.config.debugLogging) {
      console.log('[Lox24Client] API Request:', {
        ...payload,
        phone: maskPhoneNumber(phoneNumber),
        text: maskCode(message),
      });
    }

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), LOX24_TIMEOUT_MS);

    let statusCode: number;
    let responseText: string;
    try {
      const response = await fetch(`https://${this.config.lox24.apiHost}${LOX24_SMS_PATH}`, {
        method: 'POST',
        headers: {
          Accept: 'application/json',
          'Content-Type': 'application/json',
          'Content-Length': Buffer.byteLength(body).toString(),
          [LOX24_AUTH_HEADER]: this.config.lox24.authToken,
        },
        body,
        signal: controller.signal,
      });
      statusCode = response.status;
      responseText = await response.text();
    } catch (error) {
      if (controller.signal.aborted) {
        console.error(`[Lox24Client] ${LOX24_TIMEOUT_MESSAGE}`);
        return { success: false, statusCode: null, message: LOX24_TIMEOUT_MESSAGE };
      }
      const reason = error instanceof Error ? error.message : 'Unknown error';
      console.error('[Lox24Client] API Request Error:', reason);
      return { success: false, statusCode: null, message: `LOX24 API request failed: ${reason}` };
    } finally {
      clearTimeout(timer);
    }

    if (statusCode !== 201) {
      const errorMessage = getLox24ErrorMessage(statusCode);
      console.error(`[Lox24Client] API Error: ${errorMessage} (Status: ${statusCode})`);
      console.error('[Lox24Client] Response:', maskGatewayBody(responseText));
      return { success: false, statusCode, message: errorMessage };
    }

    console.log(`[Lox24Client] SMS sent successfully to ${maskPhoneNumber(phoneNumber)}`);
    if (this.config.debugLogging) {
      console.log('[Lox24Client] API Response:', maskGatewayBody(responseText));
    }

    return { success: true, statusCode, data: this.parseBody(responseText) };
  }

  // A 201 with a body that is not JSON still counts as sent
  private parseBody(responseText: string): unknown {
    try {
      const parsed: unknown = JSON.parse(responseText);
      return parsed;
    } catch {
      return responseText;
    }
  }
}
