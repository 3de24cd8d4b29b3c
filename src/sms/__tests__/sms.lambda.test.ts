/**
 * End-to-end tests for the Custom SMS Sender Lambda entry point.
 *
 * Config comes from src/setupTests.ts; KMS and LOX24 are mocked.
 */

import { Context } from 'aws-lambda';
import { handler, healthCheck } from '../sms.lambda';
import { DecryptionError, GatewayFailureError, InvalidEventShapeError } from '../sms.errors';

const mockDecrypt = jest.fn();

jest.mock('@aws-crypto/client-node', () => ({
  CommitmentPolicy: { REQUIRE_ENCRYPT_ALLOW_DECRYPT: 'REQUIRE_ENCRYPT_ALLOW_DECRYPT' },
  buildClient: jest.fn(() => ({
    decrypt: (...args: unknown[]) => mockDecrypt(...args),
  })),
  KmsKeyringNode: jest.fn(),
}));

// Mock fetch globally
global.fetch = jest.fn();

describe('Custom SMS Sender Lambda', () => {
  const mockFetch = global.fetch as jest.MockedFunction<typeof fetch>;

  const signUpEvent = {
    version: '1',
    triggerSource: 'CustomSMSSender_SignUp',
    region: 'eu-central-1',
    userPoolId: 'eu-central-1_test',
    userName: 'test-user',
    callerContext: { awsSdkVersion: 'aws-sdk-unknown-unknown', clientId: 'test-client' },
    request: {
      type: 'customSMSSenderRequestV1',
      code: Buffer.from('encrypted-code').toString('base64'),
      clientMetadata: {},
      userAttributes: { sub: 'test-sub', phone_number: '+491701234567', phone_number_verified: 'false' },
    },
    response: {},
  };

  const mockResponse = (status: number, body: string) =>
    ({
      status,
      ok: status >= 200 && status < 300,
      text: async () => body,
    }) as Response;

  beforeEach(() => {
    jest.clearAllMocks();
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should send the decrypted code and acknowledge', async () => {
    mockDecrypt.mockResolvedValueOnce({ plaintext: Buffer.from('123456'), messageHeader: {} });
    mockFetch.mockResolvedValueOnce(mockResponse(201, '{"uuid":"sms-1"}'));

    const result = await handler(signUpEvent, { awsRequestId: 'test-request' } as Context);

    expect(result).toEqual({
      statusCode: 200,
      body: JSON.stringify({ success: true, message: 'SMS sent successfully via LOX24' }),
    });
    expect(mockDecrypt).toHaveBeenCalledWith(expect.anything(), Buffer.from('encrypted-code'));

    expect(mockFetch).toHaveBeenCalledTimes(1);
    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe('https://api.lox24.test/sms');
    expect(JSON.parse(String(init?.body))).toEqual({
      sender_id: 'TestSender',
      text: 'Welcome to our service! Your verification code is: 123456',
      service_code: 'direct',
      phone: '+491701234567',
      is_unicode: false,
      callback_data: 'test-user',
    });
  });

  it('should fail on an unexpected request type without calling KMS or LOX24', async () => {
    const event = { ...signUpEvent, request: { ...signUpEvent.request, type: 'customEmailSenderRequestV1' } };

    await expect(handler(event)).rejects.toThrow(InvalidEventShapeError);
    expect(mockDecrypt).not.toHaveBeenCalled();
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('should fail when KMS rejects the ciphertext', async () => {
    mockDecrypt.mockRejectedValueOnce(new Error('Unable to decrypt data key'));

    await expect(handler(signUpEvent)).rejects.toThrow(DecryptionError);
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('should re-throw gateway failures to Cognito', async () => {
    mockDecrypt.mockResolvedValueOnce({ plaintext: Buffer.from('123456'), messageHeader: {} });
    mockFetch.mockResolvedValueOnce(mockResponse(401, '{"title":"Unauthorized"}'));

    const result = handler(signUpEvent);

    await expect(result).rejects.toThrow(GatewayFailureError);
    await expect(result).rejects.toThrow(
      'Authentication failed - LOX24 API token is invalid or inactive (HTTP 401)'
    );
  });

  describe('healthCheck', () => {
    it('should report gateway settings', async () => {
      const result = await healthCheck();
      const body = JSON.parse(result.body);

      expect(result.statusCode).toBe(200);
      expect(body.message).toBe('Custom SMS Sender Lambda is healthy');
      expect(body.gateway).toEqual({ host: 'api.lox24.test', serviceCode: 'direct' });
      expect(body.debugLogging).toBe(false);
      expect(body.environment).toEqual({
        LOX24_AUTH_TOKEN: true,
        LOX24_SENDER_ID: true,
        KMS_KEY_ID: true,
        KMS_KEY_ARN: true,
      });
      expect(result.body).not.toContain('test-token');
      expect(result.body).not.toContain('arn:aws:kms');
    });
  });
});
