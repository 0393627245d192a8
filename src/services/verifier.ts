import { secp256k1 } from '@noble/curves/secp256k1';
import { hexToBytes, recoverMessageAddress } from 'viem';
import { pino } from 'pino';
import { InsufficientAmountError, InvalidSignatureError, PaymentExpiredError } from '../domain/errors.js';
import { toChainId } from '../domain/network.js';
import type { Address, PaymentRequirements, SignedPayment } from '../domain/types.js';
import { decodePaymentHeader } from './codec.js';
import { messageHash } from './message.js';

const logger = pino();

const SIGNATURE_LENGTH = 65;
const RECOVERY_IDS: ReadonlySet<number> = new Set([0, 1, 27, 28]);

export function nowSeconds(): number {
    return Math.floor(Date.now() / 1000);
}

export class Verifier {
    /**
     * Checks a raw `X-Payment` header against the requirements it claims to
     * satisfy. Structural checks run before signature recovery; the first
     * failing check throws.
     *
     * @returns the recovered signer address. The payload's `payer` field is
     * only compared against it, never trusted on its own.
     */
    static async verify(
        paymentHeader: string,
        requirements: PaymentRequirements,
        currentTime: number = nowSeconds(),
    ): Promise<Address> {
        // 1. Decode
        const signed = decodePaymentHeader(paymentHeader);
        const { payment } = signed;

        // 2. Expiry
        if (payment.expiresAt < currentTime) {
            throw new PaymentExpiredError(payment.expiresAt, currentTime);
        }

        // 3. Amount
        if (payment.amount < requirements.amount) {
            throw new InsufficientAmountError(requirements.amount, payment.amount);
        }

        // 4. Recipient
        if (payment.recipient.toLowerCase() !== requirements.recipient.toLowerCase()) {
            throw new InvalidSignatureError('recipient mismatch', requirements.recipient, payment.recipient);
        }

        // 5. Chain
        const expectedChainId = toChainId(requirements.network);
        if (payment.chainId !== expectedChainId) {
            throw new InvalidSignatureError('chain mismatch', String(expectedChainId), String(payment.chainId));
        }

        // 6. Signature recovery
        const recovered = await this.recoverSigner(signed);

        // 7. Declared payer
        if (recovered.toLowerCase() !== payment.payer.toLowerCase()) {
            throw new InvalidSignatureError('payer mismatch', payment.payer, recovered);
        }

        logger.info(
            { payer: recovered, amount: payment.amount.toString(), chainId: payment.chainId, nonce: payment.nonce },
            'Payment verified',
        );
        return recovered;
    }

    static async recoverSigner(signed: SignedPayment): Promise<Address> {
        const bytes = hexToBytes(signed.signature);
        if (bytes.length !== SIGNATURE_LENGTH) {
            throw new InvalidSignatureError('recovery failed', `${SIGNATURE_LENGTH} bytes`, `${bytes.length} bytes`);
        }
        if (!RECOVERY_IDS.has(bytes[64])) {
            throw new InvalidSignatureError('recovery failed', 'recovery id 0, 1, 27 or 28', String(bytes[64]));
        }
        let highS: boolean;
        try {
            highS = secp256k1.Signature.fromCompact(bytes.subarray(0, 64)).hasHighS();
        } catch (error) {
            throw new InvalidSignatureError('recovery failed', undefined, undefined, { cause: error });
        }
        // High-s signatures are the malleable twins of low-s ones.
        if (highS) {
            throw new InvalidSignatureError('recovery failed', 'low-s signature', 'high-s signature');
        }

        try {
            return await recoverMessageAddress({
                message: { raw: messageHash(signed.payment) },
                signature: signed.signature,
            });
        } catch (error) {
            throw new InvalidSignatureError('recovery failed', undefined, undefined, { cause: error });
        }
    }
}
