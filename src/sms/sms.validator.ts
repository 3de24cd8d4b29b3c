/**
 * Custom SMS Sender Event Validator
 *
 * Narrows the raw Lambda payload to a CustomSmsSenderEvent and pulls out the
 * values the pipeline needs. Runs before any KMS or gateway call.
 */

import { CUSTOM_SMS_SENDER_REQUEST_TYPE, CustomSmsSenderEvent, SendSmsOptions } from './sms.types';
import { InvalidEventShapeError, MissingRecipientError } from './sms.errors';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const asString = (value: unknown): string => (typeof value === 'string' ? value : '');

// Cognito only sends string attributes; anything else is dropped
const toStringMap = (value: unknown): Record<string, string> => {
  const result: Record<string, string> = {};
  if (!isRecord(value)) return result;

  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry === 'string') {
      result[key] = entry;
    }
  }
  return result;
};

export interface EventLogContext {
  triggerSource: string;
  userPoolId: string;
  userName: string;
}

export class SmsEventValidator {
  /**
   * Identifying fields for log lines, readable even from a malformed event
   */
  getLogContext(event: unknown): EventLogContext {
    if (!isRecord(event)) {
      return { triggerSource: '', userPoolId: '', userName: '' };
    }
    return {
      triggerSource: asString(event.triggerSource),
      userPoolId: asString(event.userPoolId),
      userName: asString(event.userName),
    };
  }

  /**
   * Validate the inbound event.
   *
   * @throws InvalidEventShapeError when request.type is not customSMSSenderRequestV1
   */
  parseEvent(event: unknown): CustomSmsSenderEvent {
    if (!isRecord(event) || !isRecord(event.request)) {
      throw new InvalidEventShapeError(
        `Invalid event type. Expected ${CUSTOM_SMS_SENDER_REQUEST_TYPE}`
      );
    }

    const { request } = event;
    if (request.type !== CUSTOM_SMS_SENDER_REQUEST_TYPE) {
      throw new InvalidEventShapeError(
        `Invalid event type. Expected ${CUSTOM_SMS_SENDER_REQUEST_TYPE}`
      );
    }

    const parsed: CustomSmsSenderEvent = {
      triggerSource: asString(event.triggerSource),
      userPoolId: asString(event.userPoolId),
      userName: asString(event.userName),
      request: {
        type: CUSTOM_SMS_SENDER_REQUEST_TYPE,
        code: typeof request.code === 'string' && request.code.length > 0 ? request.code : null,
        userAttributes: toStringMap(request.userAttributes),
      },
    };

    if (isRecord(request.clientMetadata)) {
      parsed.request.clientMetadata = toStringMap(request.clientMetadata);
    }

    return parsed;
  }

  /**
   * Recipient phone number (E.164) from the user's attributes
   *
   * @throws MissingRecipientError when phone_number is absent or blank
   */
  getRecipient(event: CustomSmsSenderEvent): string {
    const phoneNumber = event.request.userAttributes.phone_number?.trim();
    if (!phoneNumber) {
      throw new MissingRecipientError();
    }
    return phoneNumber;
  }

  /**
   * Send options for the gateway: the Cognito user name as callback data, plus
   * the senderId / voiceLang overrides from clientMetadata when present.
   */
  getSendOptions(event: CustomSmsSenderEvent): SendSmsOptions {
    const options: SendSmsOptions = {};

    if (event.userName) {
      options.callbackData = event.userName;
    }

    const metadata = event.request.clientMetadata;
    if (metadata) {
      const senderId = metadata.senderId?.trim();
      const voiceLang = metadata.voiceLang?.trim();
      if (senderId) options.senderId = senderId;
      if (voiceLang) options.voiceLang = voiceLang;
    }

    return options;
  }
}

// Export singleton instance
export const smsEventValidator = new SmsEventValidator();
