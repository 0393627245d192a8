import { z } from 'zod';
import { getAddress, isAddress } from 'viem';
import { parseNetwork } from './network.js';
import type { Address, Hex, PaymentPayload, PaymentRequirements, SignedPayment } from './types.js';

function toHexBytes(value: string): Hex | undefined {
    const body = value.startsWith('0x') || value.startsWith('0X') ? value.slice(2) : value;
    if (!/^(?:[0-9a-fA-F]{2})*$/.test(body)) return undefined;
    return `0x${body}`;
}

export const AmountSchema = z
    .union([
        z.string().regex(/^\d+$/, 'must be a non-negative decimal integer'),
        z.number().int().nonnegative().safe(),
    ])
    .transform((value) => BigInt(value));

export const AddressSchema = z
    .string()
    .refine((value) => isAddress(value, { strict: false }), 'must be a 20-byte hex address')
    .transform((value): Address => getAddress(value));

export const UnixTimeSchema = z.number().int().nonnegative().safe();

export const NetworkSchema = z.string().transform((value, ctx) => {
    const network = parseNetwork(value);
    if (!network) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unsupported network "${value}"` });
        return z.NEVER;
    }
    return network;
});

export const SignatureSchema = z.string().transform((value, ctx): Hex => {
    const hex = toHexBytes(value);
    if (!hex) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be a hex byte string' });
        return z.NEVER;
    }
    return hex;
});

// Unknown keys are stripped (zod's default), which keeps decoding forward-compatible.
export const PaymentRequirementsSchema = z
    .object({
        amount: AmountSchema,
        recipient: AddressSchema,
        network: NetworkSchema,
        token: AddressSchema.nullish(),
        description: z.string().nullish(),
        expiresAt: UnixTimeSchema.nullish(),
        resource: z.string(),
    })
    .transform(
        (raw): PaymentRequirements => ({
            amount: raw.amount,
            recipient: raw.recipient,
            network: raw.network,
            ...(raw.token ? { token: raw.token } : {}),
            ...(raw.description != null ? { description: raw.description } : {}),
            ...(raw.expiresAt != null ? { expiresAt: raw.expiresAt } : {}),
            resource: raw.resource,
        }),
    );

export const PaymentPayloadSchema = z
    .object({
        amount: AmountSchema,
        recipient: AddressSchema,
        payer: AddressSchema,
        chainId: z.number().int().nonnegative().safe(),
        token: AddressSchema.nullish(),
        resource: z.string(),
        nonce: z.number().int().nonnegative().safe(),
        expiresAt: UnixTimeSchema,
    })
    .transform(
        (raw): PaymentPayload => ({
            amount: raw.amount,
            recipient: raw.recipient,
            payer: raw.payer,
            chainId: raw.chainId,
            ...(raw.token ? { token: raw.token } : {}),
            resource: raw.resource,
            nonce: raw.nonce,
            expiresAt: raw.expiresAt,
        }),
    );

export const SignedPaymentSchema = z
    .object({
        payment: PaymentPayloadSchema,
        signature: SignatureSchema,
    })
    .transform((raw): SignedPayment => ({ payment: raw.payment, signature: raw.signature }));

export const VerifyRequestSchema = z.object({
    paymentHeader: z.string().min(1),
    requirements: PaymentRequirementsSchema,
});

export type PaymentRequirementsWire = z.input<typeof PaymentRequirementsSchema>;
export type SignedPaymentWire = z.input<typeof SignedPaymentSchema>;
