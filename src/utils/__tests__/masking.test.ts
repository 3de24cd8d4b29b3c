import { maskCode, maskEventForLogging, maskGatewayBody, maskPhoneNumber } from '../masking';
import { CustomSmsSenderEvent } from '../../sms/sms.types';

describe('Masking utilities', () => {
  describe('maskPhoneNumber', () => {
    it('should keep first and last 3 characters', () => {
      expect(maskPhoneNumber('+491701234567')).toBe('+49*******567');
    });

    it('should preserve length', () => {
      const phone = '+15551234567';
      const masked = maskPhoneNumber(phone);
      expect(masked).toHaveLength(phone.length);
      expect(masked).toBe('+15******567');
    });

    it('should return placeholder for short or empty values', () => {
      expect(maskPhoneNumber('')).toBe('****');
      expect(maskPhoneNumber('123')).toBe('****');
      expect(maskPhoneNumber(undefined)).toBe('****');
      expect(maskPhoneNumber(null)).toBe('****');
    });

    it('should mask everything after the first 3 characters for 4-5 character values', () => {
      expect(maskPhoneNumber('1234')).toBe('123*');
      expect(maskPhoneNumber('+4915')).toBe('+49**');
    });

    it('should return 6 character values unchanged since head and tail cover them', () => {
      expect(maskPhoneNumber('123456')).toBe('123456');
    });
  });

  describe('maskCode', () => {
    it('should mask a 6 digit code', () => {
      expect(maskCode('Your verification code is: 123456')).toBe('Your verification code is: ****');
    });

    it('should mask every 4-8 digit run', () => {
      expect(maskCode('Codes 1234 and 87654321')).toBe('Codes **** and ****');
    });

    it('should leave shorter, longer and embedded digit runs alone', () => {
      expect(maskCode('This code will expire in 3 minutes.')).toBe('This code will expire in 3 minutes.');
      expect(maskCode('ref 123456789')).toBe('ref 123456789');
      expect(maskCode('abc1234')).toBe('abc1234');
    });
  });

  describe('maskGatewayBody', () => {
    it('should mask echoed phone numbers and codes', () => {
      const body = '{"uuid":"sms-1","phone":"+491701234567","text":"Your verification code is: 123456"}';

      expect(maskGatewayBody(body)).toBe(
        '{"uuid":"sms-1","phone":"+49*******567","text":"Your verification code is: ****"}'
      );
    });

    it('should mask phone numbers without a leading plus', () => {
      expect(maskGatewayBody('{"phone":"491701234567"}')).toBe('{"phone":"491******567"}');
    });

    it('should leave bodies without sensitive values unchanged', () => {
      expect(maskGatewayBody('{"title":"Unauthorized","status":401}')).toBe(
        '{"title":"Unauthorized","status":401}'
      );
    });
  });

  describe('maskEventForLogging', () => {
    const event: CustomSmsSenderEvent = {
      triggerSource: 'CustomSMSSender_SignUp',
      userPoolId: 'eu-central-1_test',
      userName: 'test-user',
      request: {
        type: 'customSMSSenderRequestV1',
        code: 'Y2lwaGVydGV4dA==',
        userAttributes: { phone_number: '+491701234567', email: 'user@example.com' },
      },
    };

    it('should hide the ciphertext and mask the phone number', () => {
      const masked = maskEventForLogging(event);

      expect(masked.request.code).toBe('[ENCRYPTED]');
      expect(masked.request.userAttributes).toEqual({
        phone_number: '+49*******567',
        email: 'user@example.com',
      });
    });

    it('should not modify the original event', () => {
      maskEventForLogging(event);

      expect(event.request.code).toBe('Y2lwaGVydGV4dA==');
      expect(event.request.userAttributes.phone_number).toBe('+491701234567');
    });

    it('should keep a null code as null', () => {
      const masked = maskEventForLogging({ ...event, request: { ...event.request, code: null } });
      expect(masked.request.code).toBeNull();
    });
  });
});
