import { getAddress, keccak256, stringToBytes } from 'viem';
import { EncodingError } from '../domain/errors.js';
import type { Hex, PaymentPayload } from '../domain/types.js';

export const PAYMENT_MESSAGE_HEADER = 'x402 Payment';

/**
 * Renders a non-negative integer in base 10. bigint formatting is
 * locale-independent, so signer and verifier always agree on the bytes.
 */
export function formatUnsigned(value: bigint | number, field: string): string {
    if (typeof value === 'number' && !Number.isSafeInteger(value)) {
        throw new EncodingError(`${field} must be a safe integer, got ${value}`);
    }
    const integer = BigInt(value);
    if (integer < 0n) {
        throw new EncodingError(`${field} must be non-negative, got ${integer}`);
    }
    return integer.toString(10);
}

/**
 * Canonical signing pre-image. Field order is fixed:
 * amount, recipient, payer, chain id, resource, nonce, expiry.
 * Addresses are rendered checksummed regardless of input casing.
 */
export function paymentMessage(payload: PaymentPayload): string {
    return [
        PAYMENT_MESSAGE_HEADER,
        `Amount: ${formatUnsigned(payload.amount, 'amount')}`,
        `Recipient: ${getAddress(payload.recipient)}`,
        `Payer: ${getAddress(payload.payer)}`,
        `ChainId: ${formatUnsigned(payload.chainId, 'chainId')}`,
        `Resource: ${payload.resource}`,
        `Nonce: ${formatUnsigned(payload.nonce, 'nonce')}`,
        `Expires: ${formatUnsigned(payload.expiresAt, 'expiresAt')}`,
    ].join('\n');
}

/** keccak-256 of the UTF-8 pre-image; 32 bytes, 0x-prefixed. */
export function messageHash(payload: PaymentPayload): Hex {
    return keccak256(stringToBytes(paymentMessage(payload)));
}
