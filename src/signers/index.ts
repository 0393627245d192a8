import { isHex, size } from 'viem';
import type { AppConfig } from '../config.js';
import type { IPaymentSigner } from '../domain/signer.js';
import { KmsSigner, type IKmsKeyClient } from './kms.js';
import { LocalSigner } from './local.js';

export { KmsSigner, AwsKmsKeyClient, type IKmsKeyClient, type KmsSignerOptions } from './kms.js';
export { LocalSigner } from './local.js';

export type SignerSettings = Pick<AppConfig, 'signerBackend' | 'privateKey' | 'kmsKeyId' | 'awsRegion'>;

/** Picks the signing backend named by configuration. */
export function createSigner(settings: SignerSettings, kmsClient?: IKmsKeyClient): IPaymentSigner {
    switch (settings.signerBackend) {
        case 'local': {
            const privateKey = settings.privateKey;
            if (!privateKey) {
                throw new Error('X402_PRIVATE_KEY is required when SIGNER_BACKEND=local');
            }
            if (!isHex(privateKey, { strict: true }) || size(privateKey) !== 32) {
                throw new Error('X402_PRIVATE_KEY must be a 0x-prefixed 32-byte hex string');
            }
            return LocalSigner.fromPrivateKey(privateKey);
        }
        case 'kms': {
            if (!settings.kmsKeyId) {
                throw new Error('KMS_KEY_ID is required when SIGNER_BACKEND=kms');
            }
            return new KmsSigner({ keyId: settings.kmsKeyId, region: settings.awsRegion, client: kmsClient });
        }
    }
}
