/**
 * SMS Message Formatter
 *
 * Builds the outbound SMS text for each Cognito custom SMS sender trigger.
 */

import { CUSTOM_SMS_TRIGGER_SOURCES, CustomSmsTriggerSource } from './sms.types';

export const isCustomSmsTriggerSource = (value: string): value is CustomSmsTriggerSource =>
  CUSTOM_SMS_TRIGGER_SOURCES.some((source) => source === value);

export class SmsFormatter {
  /**
   * Format the message for a trigger.
   *
   * Unknown trigger sources fall back to the generic verification template
   * instead of failing. A missing code renders as an empty string.
   */
  formatMessage(
    triggerSource: string,
    code: string | null,
    _userAttributes: Record<string, string> = {}
  ): string {
    const value = code ?? '';

    if (!isCustomSmsTriggerSource(triggerSource)) {
      return this.formatDefault(value);
    }

    return this.formatForTrigger(triggerSource, value);
  }

  // No default arm: a new trigger source added to the union fails to compile here
  private formatForTrigger(triggerSource: CustomSmsTriggerSource, code: string): string {
    switch (triggerSource) {
      case 'CustomSMSSender_SignUp':
        return `Welcome to our service! Your verification code is: ${code}`;
      case 'CustomSMSSender_ForgotPassword':
        return `Your password reset code is: ${code}. If you didn't request this, please ignore this message.`;
      case 'CustomSMSSender_ResendCode':
        return `Your verification code is: ${code}`;
      case 'CustomSMSSender_VerifyUserAttribute':
        return `Your verification code is: ${code}`;
      case 'CustomSMSSender_UpdateUserAttribute':
        return `Your verification code to update your phone number is: ${code}`;
      case 'CustomSMSSender_Authentication':
        return `Your authentication code is: ${code}. This code will expire in 3 minutes.`;
      case 'CustomSMSSender_AdminCreateUser':
        return `Welcome! Your temporary password is: ${code}. Please change it after your first login.`;
    }
  }

  private formatDefault(code: string): string {
    return `Your verification code is: ${code}`;
  }

  /**
   * True when the text needs unicode encoding (any char above 7-bit ASCII)
   */
  containsUnicode(text: string): boolean {
    for (let i = 0; i < text.length; i++) {
      if (text.charCodeAt(i) > 127) {
        return true;
      }
    }
    return false;
  }
}

// Export singleton instance
export const smsFormatter = new SmsFormatter();
