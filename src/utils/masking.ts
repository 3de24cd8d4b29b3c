/**
 * Log masking helpers.
 *
 * Phone numbers and one-time codes must never reach CloudWatch in clear text,
 * whatever the logging verbosity.
 */

import { CustomSmsSenderEvent } from '../sms/sms.types';

/**
 * Keep the first and last 3 characters, star out the rest.
 * Anything shorter than 4 characters becomes '****'; otherwise the length is kept.
 */
export const maskPhoneNumber = (phoneNumber: string | null | undefined): string => {
  if (!phoneNumber || phoneNumber.length < 4) {
    return '****';
  }
  if (phoneNumber.length < 6) {
    // head and tail would overlap, so only the head survives
    return phoneNumber.substring(0, 3) + '*'.repeat(phoneNumber.length - 3);
  }
  return (
    phoneNumber.substring(0, 3) +
    '*'.repeat(phoneNumber.length - 6) +
    phoneNumber.substring(phoneNumber.length - 3)
  );
};

/**
 * Replace every standalone run of 4-8 digits with '****'
 */
export const maskCode = (message: string): string => {
  return message.replace(/\b\d{4,8}\b/g, '****');
};

/**
 * Mask a gateway response body for logging. LOX24 echoes the phone number and
 * the message text, so phone-like digit runs and codes are both hidden.
 */
export const maskGatewayBody = (body: string): string => {
  const withoutPhones = body.replace(/\+?\b\d{9,15}\b/g, (match) => maskPhoneNumber(match));
  return maskCode(withoutPhones);
};

/**
 * Copy of the event that is safe to log in full
 */
export const maskEventForLogging = (event: CustomSmsSenderEvent): CustomSmsSenderEvent => {
  const userAttributes = { ...event.request.userAttributes };
  if (userAttributes.phone_number !== undefined) {
    userAttributes.phone_number = maskPhoneNumber(userAttributes.phone_number);
  }

  return {
    ...event,
    request: {
      ...event.request,
      code: event.request.code ? '[ENCRYPTED]' : event.request.code,
      userAttributes,
    },
  };
};
