import { ConfigurationError } from './sms/sms.errors';

export const DEFAULT_LOX24_API_HOST = 'api.lox24.eu';
export const DEFAULT_LOX24_SERVICE_CODE = 'direct';

export interface SenderConfig {
  lox24: {
    authToken: string;
    senderId: string;
    apiHost: string;
    serviceCode: string;
  };
  kms: {
    keyId: string;             // generator key
    keyArn: string;            // only key the keyring will accept
  };
  debugLogging: boolean;
}

const REQUIRED_VARS = ['LOX24_AUTH_TOKEN', 'LOX24_SENDER_ID', 'KMS_KEY_ID', 'KMS_KEY_ARN'] as const;

const readVar = (env: NodeJS.ProcessEnv, name: string): string | undefined => {
  const value = env[name]?.trim();
  return value ? value : undefined;
};

/**
 * Build the sender configuration from the environment.
 *
 * Called once per Lambda container. Throws ConfigurationError listing every
 * required variable that is missing or blank.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): Readonly<SenderConfig> => {
  const missing = REQUIRED_VARS.filter((name) => !readVar(env, name));
  if (missing.length > 0) {
    throw new ConfigurationError([...missing]);
  }

  const required = (name: (typeof REQUIRED_VARS)[number]): string => readVar(env, name) ?? '';

  return Object.freeze({
    lox24: Object.freeze({
      authToken: required('LOX24_AUTH_TOKEN'),
      senderId: required('LOX24_SENDER_ID'),
      apiHost: readVar(env, 'LOX24_API_HOST') ?? DEFAULT_LOX24_API_HOST,
      serviceCode: readVar(env, 'LOX24_SERVICE_CODE') ?? DEFAULT_LOX24_SERVICE_CODE,
    }),
    kms: Object.freeze({
      keyId: required('KMS_KEY_ID'),
      keyArn: required('KMS_KEY_ARN'),
    }),
    debugLogging: env.ENABLE_DEBUG_LOGGING === 'true',
  });
};
