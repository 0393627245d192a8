import { getAddress } from 'viem';
import type { z } from 'zod';
import { InvalidHeaderError, type PaymentHeaderName } from '../domain/errors.js';
import {
    PaymentRequirementsSchema,
    SignedPaymentSchema,
    type PaymentRequirementsWire,
    type SignedPaymentWire,
} from '../domain/schemas.js';
import type { PaymentRequirements, SignedPayment } from '../domain/types.js';
import { formatUnsigned } from './message.js';

export const X402_REQUIREMENTS_HEADER = 'X-Payment-Requirements';
export const X402_PAYMENT_HEADER = 'X-Payment';

export const MAX_HEADER_LENGTH = 8192;

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

const utf8 = new TextDecoder('utf-8', { fatal: true });

function toBase64(value: unknown): string {
    return Buffer.from(JSON.stringify(value), 'utf8').toString('base64');
}

function decodeHeader<S extends z.ZodTypeAny>(header: PaymentHeaderName, value: string, schema: S): z.output<S> {
    // 1. Transport encoding
    if (typeof value !== 'string' || value.length === 0) {
        throw new InvalidHeaderError(header, 'empty value');
    }
    if (value.length > MAX_HEADER_LENGTH) {
        throw new InvalidHeaderError(header, `value exceeds ${MAX_HEADER_LENGTH} characters`);
    }
    const trimmed = value.trim();
    if (!BASE64_PATTERN.test(trimmed)) {
        throw new InvalidHeaderError(header, 'base64 decode failed');
    }

    let json: string;
    try {
        json = utf8.decode(Buffer.from(trimmed, 'base64'));
    } catch (error) {
        throw new InvalidHeaderError(header, 'invalid UTF-8', { cause: error });
    }

    // 2. Structured record
    let parsed: unknown;
    try {
        parsed = JSON.parse(json);
    } catch (error) {
        throw new InvalidHeaderError(header, 'JSON parse failed', { cause: error });
    }

    // 3. Required fields
    const result = schema.safeParse(parsed);
    if (!result.success) {
        const detail = result.error.issues
            .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
            .join('; ');
        throw new InvalidHeaderError(header, detail, { cause: result.error });
    }
    return result.data;
}

export function toRequirementsWire(requirements: PaymentRequirements): PaymentRequirementsWire {
    return {
        amount: formatUnsigned(requirements.amount, 'amount'),
        recipient: getAddress(requirements.recipient),
        network: requirements.network,
        ...(requirements.token ? { token: getAddress(requirements.token) } : {}),
        ...(requirements.description !== undefined ? { description: requirements.description } : {}),
        ...(requirements.expiresAt !== undefined ? { expiresAt: requirements.expiresAt } : {}),
        resource: requirements.resource,
    };
}

export function toSignedPaymentWire(signed: SignedPayment): SignedPaymentWire {
    const { payment } = signed;
    return {
        payment: {
            amount: formatUnsigned(payment.amount, 'amount'),
            recipient: getAddress(payment.recipient),
            payer: getAddress(payment.payer),
            chainId: payment.chainId,
            ...(payment.token ? { token: getAddress(payment.token) } : {}),
            resource: payment.resource,
            nonce: payment.nonce,
            expiresAt: payment.expiresAt,
        },
        signature: signed.signature,
    };
}

export function encodeRequirementsHeader(requirements: PaymentRequirements): string {
    return toBase64(toRequirementsWire(requirements));
}

export function decodeRequirementsHeader(value: string): PaymentRequirements {
    return decodeHeader(X402_REQUIREMENTS_HEADER, value, PaymentRequirementsSchema);
}

export function encodePaymentHeader(signed: SignedPayment): string {
    return toBase64(toSignedPaymentWire(signed));
}

export function decodePaymentHeader(value: string): SignedPayment {
    return decodeHeader(X402_PAYMENT_HEADER, value, SignedPaymentSchema);
}
