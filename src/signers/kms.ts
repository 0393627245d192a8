import { GetPublicKeyCommand, KMSClient, SignCommand } from '@aws-sdk/client-kms';
import { secp256k1 } from '@noble/curves/secp256k1';
import { bytesToHex, concat, hashMessage, hexToBytes, numberToHex, recoverAddress } from 'viem';
import { publicKeyToAddress } from 'viem/accounts';
import { pino } from 'pino';
import type { IPaymentSigner } from '../domain/signer.js';
import type { Address, Hex, PaymentPayload } from '../domain/types.js';
import { messageHash } from '../services/message.js';

const logger = pino();

// SubjectPublicKeyInfo header for an uncompressed ECC_SECG_P256K1 key; the 65-byte point follows.
const SPKI_SECP256K1_PREFIX = hexToBytes('0x3056301006072a8648ce3d020106052b8104000a034200');

/** Uncompressed public key (0x04 ‖ x ‖ y) from the DER SubjectPublicKeyInfo KMS returns. */
export function publicKeyFromSpki(spki: Uint8Array): Hex {
    const prefix = spki.subarray(0, SPKI_SECP256K1_PREFIX.length);
    if (spki.length !== SPKI_SECP256K1_PREFIX.length + 65 || bytesToHex(prefix) !== bytesToHex(SPKI_SECP256K1_PREFIX)) {
        throw new Error('KMS public key is not an uncompressed secp256k1 key');
    }
    const point = secp256k1.Point.fromHex(spki.subarray(SPKI_SECP256K1_PREFIX.length));
    return bytesToHex(point.toBytes(false));
}

/** The two KMS operations the signer needs. Both return DER. */
export interface IKmsKeyClient {
    signDigest(keyId: string, digest: Uint8Array): Promise<Uint8Array>;
    getPublicKey(keyId: string): Promise<Uint8Array>;
}

export class AwsKmsKeyClient implements IKmsKeyClient {
    constructor(private readonly kms: KMSClient) { }

    async signDigest(keyId: string, digest: Uint8Array): Promise<Uint8Array> {
        const response = await this.kms.send(
            new SignCommand({
                KeyId: keyId,
                Message: digest,
                MessageType: 'DIGEST',
                SigningAlgorithm: 'ECDSA_SHA_256',
            }),
        );
        if (!response.Signature) {
            throw new Error(`KMS returned no signature for key ${keyId}`);
        }
        return response.Signature;
    }

    async getPublicKey(keyId: string): Promise<Uint8Array> {
        const response = await this.kms.send(new GetPublicKeyCommand({ KeyId: keyId }));
        if (!response.PublicKey) {
            throw new Error(`KMS returned no public key for key ${keyId}`);
        }
        return response.PublicKey;
    }
}

export interface KmsSignerOptions {
    keyId: string;
    region?: string;
    client?: IKmsKeyClient;
}

/**
 * Signs with an ECC_SECG_P256K1 key held in AWS KMS. The key never leaves
 * the HSM; KMS signs the EIP-191 digest and the DER result is converted to
 * r ‖ s ‖ v here.
 */
export class KmsSigner implements IPaymentSigner {
    private readonly keyId: string;
    private readonly client: IKmsKeyClient;
    private address?: Address;

    constructor(options: KmsSignerOptions) {
        this.keyId = options.keyId;
        this.client = options.client ?? new AwsKmsKeyClient(new KMSClient({ region: options.region }));
    }

    async getAddress(): Promise<Address> {
        if (!this.address) {
            const spki = await this.client.getPublicKey(this.keyId);
            this.address = publicKeyToAddress(publicKeyFromSpki(spki));
            logger.info({ keyId: this.keyId, address: this.address }, 'Resolved KMS signer address');
        }
        return this.address;
    }

    async sign(payload: PaymentPayload): Promise<Hex> {
        const digest = hashMessage({ raw: messageHash(payload) });
        const der = await this.client.signDigest(this.keyId, hexToBytes(digest));
        const { r, s } = secp256k1.Signature.fromDER(der).normalizeS();
        const rs = concat([numberToHex(r, { size: 32 }), numberToHex(s, { size: 32 })]);

        // KMS does not report the recovery id; pick the one that recovers our own key.
        const address = await this.getAddress();
        for (const v of [27, 28]) {
            const signature = concat([rs, numberToHex(v, { size: 1 })]);
            const recovered = await recoverAddress({ hash: digest, signature });
            if (recovered === address) {
                return signature;
            }
        }
        throw new Error(`KMS signature for key ${this.keyId} does not recover to ${address}`);
    }
}
