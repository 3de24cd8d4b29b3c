/**
 * Error taxonomy for the custom SMS sender.
 *
 * Every error raised while handling an event is re-thrown to Cognito, which
 * treats it as a failed trigger and applies its own retry policy.
 */

export class CustomSmsSenderError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CustomSmsSenderError';
  }
}

export class InvalidEventShapeError extends CustomSmsSenderError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidEventShapeError';
  }
}

export class MissingRecipientError extends CustomSmsSenderError {
  constructor() {
    super('No phone number found in user attributes');
    this.name = 'MissingRecipientError';
  }
}

export class InvalidInputError extends CustomSmsSenderError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidInputError';
  }
}

// Message stays generic so nothing about the key or ciphertext leaks out
export class DecryptionError extends CustomSmsSenderError {
  constructor() {
    super('Failed to decrypt verification code');
    this.name = 'DecryptionError';
  }
}

export class GatewayFailureError extends CustomSmsSenderError {
  readonly statusCode: number | null;

  constructor(message: string, statusCode: number | null) {
    super(statusCode === null ? message : `${message} (HTTP ${statusCode})`);
    this.name = 'GatewayFailureError';
    this.statusCode = statusCode;
  }
}

export class ConfigurationError extends CustomSmsSenderError {
  readonly missing: string[];

  constructor(missing: string[]) {
    super(`Missing required environment variable(s): ${missing.join(', ')}`);
    this.name = 'ConfigurationError';
    this.missing = missing;
  }
}
