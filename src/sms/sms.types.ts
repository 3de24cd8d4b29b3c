/**
 * Custom SMS Sender Types
 *
 * Shapes of the Cognito custom SMS sender event, the LOX24 request payload and
 * the results passed between decryptor, formatter and gateway client.
 */

export const CUSTOM_SMS_SENDER_REQUEST_TYPE = 'customSMSSenderRequestV1';

export type CustomSmsTriggerSource =
  | 'CustomSMSSender_SignUp'
  | 'CustomSMSSender_ForgotPassword'
  | 'CustomSMSSender_ResendCode'
  | 'CustomSMSSender_VerifyUserAttribute'
  | 'CustomSMSSender_UpdateUserAttribute'
  | 'CustomSMSSender_Authentication'
  | 'CustomSMSSender_AdminCreateUser';

export const CUSTOM_SMS_TRIGGER_SOURCES: readonly CustomSmsTriggerSource[] = [
  'CustomSMSSender_SignUp',
  'CustomSMSSender_ForgotPassword',
  'CustomSMSSender_ResendCode',
  'CustomSMSSender_VerifyUserAttribute',
  'CustomSMSSender_UpdateUserAttribute',
  'CustomSMSSender_Authentication',
  'CustomSMSSender_AdminCreateUser',
];

export interface CustomSmsSenderEvent {
  // Kept as string: unknown trigger sources are tolerated and get the default template
  triggerSource: string;
  userPoolId: string;
  userName: string;
  request: {
    type: typeof CUSTOM_SMS_SENDER_REQUEST_TYPE;
    code: string | null;         // base64 ciphertext from Cognito
    userAttributes: Record<string, string>;
    clientMetadata?: Record<string, string>;
  };
}

export interface SendSmsOptions {
  senderId?: string;
  serviceCode?: string;
  callbackData?: string;
  deliveryAt?: number;         // unix timestamp, scheduled delivery
  voiceLang?: string;
}

/**
 * Body of POST /sms on the LOX24 API
 */
export interface Lox24SmsRequest {
  sender_id: string;
  text: string;
  service_code: string;
  phone: string;               // E.164
  is_unicode: boolean;
  callback_data?: string;
  delivery_at?: number;
  voice_lang?: string;
}

export type DispatchResult =
  | { success: true; statusCode: number; data: unknown }
  | { success: false; statusCode: number | null; message: string };

export interface CustomSmsSenderResponse {
  statusCode: 200;
  body: string;
}
