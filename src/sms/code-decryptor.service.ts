/**
 * Code Decryptor Service
 *
 * Cognito encrypts the one-time code with the AWS Encryption SDK under the KMS
 * key configured on the user pool. This service unwraps it again.
 */

import { buildClient, CommitmentPolicy, KmsKeyringNode } from '@aws-crypto/client-node';
import { SenderConfig } from '../config';
import { DecryptionError, InvalidInputError } from './sms.errors';

export type EnvelopeDecrypt = (ciphertext: Buffer) => Promise<{ plaintext: Buffer }>;

/**
 * Envelope decrypt bound to a keyring that uses the configured key as
 * generator and accepts nothing but the configured key ARN.
 */
export const createKmsEnvelopeDecrypt = (kms: SenderConfig['kms']): EnvelopeDecrypt => {
  const { decrypt } = buildClient(CommitmentPolicy.REQUIRE_ENCRYPT_ALLOW_DECRYPT);
  const keyring = new KmsKeyringNode({
    generatorKeyId: kms.keyId,
    keyIds: [kms.keyArn],
  });

  return async (ciphertext) => {
    const { plaintext } = await decrypt(keyring, ciphertext);
    return { plaintext };
  };
};

export class CodeDecryptor {
  private envelopeDecrypt: EnvelopeDecrypt;

  constructor(envelopeDecrypt: EnvelopeDecrypt) {
    this.envelopeDecrypt = envelopeDecrypt;
  }

  static fromConfig(config: Pick<SenderConfig, 'kms'>): CodeDecryptor {
    return new CodeDecryptor(createKmsEnvelopeDecrypt(config.kms));
  }

  /**
   * Decrypt a base64 ciphertext into the plaintext code.
   *
   * The result is sensitive: callers must never log it or put it in an error.
   *
   * @throws InvalidInputError when no ciphertext is given
   * @throws DecryptionError for any KMS or Encryption SDK failure
   */
  async decrypt(encryptedCode: string | null | undefined): Promise<string> {
    if (!encryptedCode) {
      throw new InvalidInputError('No code provided to decrypt');
    }

    try {
      const { plaintext } = await this.envelopeDecrypt(Buffer.from(encryptedCode, 'base64'));
      return Buffer.from(plaintext).toString('utf-8');
    } catch (error) {
      console.error('[CodeDecryptor] Error decrypting code:', {
        errorName: error instanceof Error ? error.name : 'Unknown',
      });
      throw new DecryptionError();
    }
  }
}
