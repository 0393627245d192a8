import { describe, it, expect } from 'vitest';
import { keccak256, stringToBytes } from 'viem';
import { formatUnsigned, messageHash, paymentMessage } from '../../src/services/message.js';
import { EncodingError } from '../../src/domain/errors.js';
import type { PaymentPayload } from '../../src/domain/types.js';

describe('Payment message', () => {
    const payload: PaymentPayload = {
        amount: 1000000n,
        recipient: '0x2222222222222222222222222222222222222222',
        payer: '0x1111111111111111111111111111111111111111',
        chainId: 8453,
        resource: 'https://api.example.com/premium',
        nonce: 7,
        expiresAt: 1700000300,
    };

    it('should render the canonical pre-image', () => {
        expect(paymentMessage(payload)).toBe(
            [
                'x402 Payment',
                'Amount: 1000000',
                'Recipient: 0x2222222222222222222222222222222222222222',
                'Payer: 0x1111111111111111111111111111111111111111',
                'ChainId: 8453',
                'Resource: https://api.example.com/premium',
                'Nonce: 7',
                'Expires: 1700000300',
            ].join('\n'),
        );
    });

    it('should hash the UTF-8 pre-image with keccak-256', () => {
        expect(messageHash(payload)).toBe(keccak256(stringToBytes(paymentMessage(payload))));
        expect(messageHash(payload)).toMatch(/^0x[0-9a-f]{64}$/);
    });

    it('should render addresses checksummed whatever their input casing', () => {
        const lower: PaymentPayload = { ...payload, recipient: '0x52908400098527886e0f7030069857d2e4169ee7' };
        const upper: PaymentPayload = { ...payload, recipient: '0x52908400098527886E0F7030069857D2E4169EE7' };
        expect(paymentMessage(lower)).toContain('Recipient: 0x52908400098527886E0F7030069857D2E4169EE7');
        expect(messageHash(lower)).toBe(messageHash(upper));
    });

    it('should change the hash when any signed field changes', () => {
        const base = messageHash(payload);
        const variants: PaymentPayload[] = [
            { ...payload, amount: 1000001n },
            { ...payload, recipient: '0x3333333333333333333333333333333333333333' },
            { ...payload, payer: '0x4444444444444444444444444444444444444444' },
            { ...payload, chainId: 1 },
            { ...payload, resource: 'https://api.example.com/other' },
            { ...payload, nonce: 8 },
            { ...payload, expiresAt: 1700000301 },
        ];
        for (const variant of variants) {
            expect(messageHash(variant)).not.toBe(base);
        }
    });

    it('should not bind the token address', () => {
        const withToken = { ...payload, token: '0x5555555555555555555555555555555555555555' as const };
        expect(messageHash(withToken)).toBe(messageHash(payload));
    });

    it('should format amounts beyond 64 bits exactly', () => {
        const big = { ...payload, amount: 2n ** 70n };
        expect(paymentMessage(big)).toContain('Amount: 1180591620717411303424');
    });

    it('should reject values that cannot be rendered as unsigned integers', () => {
        expect(() => formatUnsigned(-1n, 'amount')).toThrow(EncodingError);
        expect(() => formatUnsigned(1.5, 'nonce')).toThrow('nonce must be a safe integer, got 1.5');
        expect(() => messageHash({ ...payload, nonce: -1 })).toThrow('nonce must be non-negative, got -1');
    });
});
