/**
 * Custom SMS Sender Service
 *
 * Orchestrates one Cognito custom SMS sender invocation:
 * - Validate the event and find the recipient
 * - Decrypt the one-time code (when Cognito sent one)
 * - Format the message for the trigger
 * - Send it through LOX24
 *
 * Nothing is retried here. Any error is logged and re-thrown so Cognito marks
 * the trigger as failed.
 */

import { SenderConfig } from '../config';
import { maskEventForLogging } from '../utils/masking';
import { CodeDecryptor } from './code-decryptor.service';
import { SmsGateway } from './lox24.client';
import { GatewayFailureError } from './sms.errors';
import { SmsFormatter, smsFormatter } from './sms.formatter';
import { CustomSmsSenderResponse } from './sms.types';
import { SmsEventValidator, smsEventValidator } from './sms.validator';

export const SUCCESS_MESSAGE = 'SMS sent successfully via LOX24';

export class CustomSmsSenderService {
  private config: Pick<SenderConfig, 'debugLogging'>;
  private decryptor: Pick<CodeDecryptor, 'decrypt'>;
  private gateway: SmsGateway;
  private validator: SmsEventValidator;
  private formatter: SmsFormatter;

  constructor(
    config: Pick<SenderConfig, 'debugLogging'>,
    decryptor: Pick<CodeDecryptor, 'decrypt'>,
    gateway: SmsGateway,
    validator: SmsEventValidator = smsEventValidator,
    formatter: SmsFormatter = smsFormatter
  ) {
    this.config = config;
    this.decryptor = decryptor;
    this.gateway = gateway;
    this.validator = validator;
    this.formatter = formatter;
  }

  /**
   * Handle one custom SMS sender event
   *
   * @param rawEvent - Event as delivered by Cognito
   * @returns Fixed acknowledgment once LOX24 accepted the SMS
   */
  async processEvent(rawEvent: unknown): Promise<CustomSmsSenderResponse> {
    const logContext = this.validator.getLogContext(rawEvent);
    console.log('[CustomSmsSender] Received Cognito Custom SMS Sender event:', logContext);

    try {
      // 1. Validate
      const event = this.validator.parseEvent(rawEvent);

      if (this.config.debugLogging) {
        console.log('[CustomSmsSender] Full event:', JSON.stringify(maskEventForLogging(event), null, 2));
      }

      const phoneNumber = this.validator.getRecipient(event);

      // 2. Decrypt
      let plainTextCode: string | null = null;
      if (event.request.code) {
        plainTextCode = await this.decryptor.decrypt(event.request.code);
      } else {
        console.warn('[CustomSmsSender] No code in event, skipping decryption:', {
          triggerSource: event.triggerSource,
        });
      }

      // 3. Format
      const message = this.formatter.formatMessage(
        event.triggerSource,
        plainTextCode,
        event.request.userAttributes
      );

      // 4. Send
      const result = await this.gateway.send(phoneNumber, message, this.validator.getSendOptions(event));
      if (!result.success) {
        throw new GatewayFailureError(result.message, result.statusCode);
      }

      console.log(
        `[CustomSmsSender] Successfully processed ${event.triggerSource} for user ${event.userName}`
      );

      return {
        statusCode: 200,
        body: JSON.stringify({
          success: true,
          message: SUCCESS_MESSAGE,
        }),
      };
    } catch (error) {
      console.error('[CustomSmsSender] Error context:', {
        triggerSource: logContext.triggerSource,
        userName: logContext.userName,
        errorName: error instanceof Error ? error.name : 'Unknown',
        errorMessage: error instanceof Error ? error.message : 'Unknown error',
      });

      throw error;
    }
  }
}
