/**
 * Custom SMS Sender Lambda Function
 *
 * Entry point for the Cognito user pool CustomSMSSender trigger. Config is read
 * once per container; a missing required variable fails the cold start.
 */

import { Context } from 'aws-lambda';
import { loadConfig } from '../config';
import { CodeDecryptor } from './code-decryptor.service';
import { Lox24Client } from './lox24.client';
import { CustomSmsSenderService } from './sms.service';
import { CustomSmsSenderResponse } from './sms.types';

const config = loadConfig();

const customSmsSenderService = new CustomSmsSenderService(
  config,
  CodeDecryptor.fromConfig(config),
  new Lox24Client(config)
);

/**
 * Lambda handler for Cognito custom SMS sender events
 */
export async function handler(event: unknown, context?: Context): Promise<CustomSmsSenderResponse> {
  if (context) {
    console.log('[CustomSmsSender] Invocation:', { requestId: context.awsRequestId });
  }
  return customSmsSenderService.processEvent(event);
}

/**
 * Health check handler for testing
 */
export async function healthCheck(): Promise<CustomSmsSenderResponse> {
  return {
    statusCode: 200,
    body: JSON.stringify({
      message: 'Custom SMS Sender Lambda is healthy',
      timestamp: new Date().toISOString(),
      gateway: {
        host: config.lox24.apiHost,
        serviceCode: config.lox24.serviceCode,
      },
      debugLogging: config.debugLogging,
      environment: {
        LOX24_AUTH_TOKEN: config.lox24.authToken.length > 0,
        LOX24_SENDER_ID: config.lox24.senderId.length > 0,
        KMS_KEY_ID: config.kms.keyId.length > 0,
        KMS_KEY_ARN: config.kms.keyArn.length > 0,
      },
    }),
  };
}
