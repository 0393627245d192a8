export const ErrorCodes = {
    INVALID_HEADER: 'INVALID_HEADER',
    PAYMENT_EXPIRED: 'PAYMENT_EXPIRED',
    INSUFFICIENT_AMOUNT: 'INSUFFICIENT_AMOUNT',
    INVALID_SIGNATURE: 'INVALID_SIGNATURE',
    TRANSPORT_ERROR: 'TRANSPORT_ERROR',
    ENCODING_ERROR: 'ENCODING_ERROR',
    UNSUPPORTED_NETWORK: 'UNSUPPORTED_NETWORK',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Base class of every protocol failure. `code` is stable and safe to
 * return to HTTP callers; `message` carries the diagnostic detail.
 */
export abstract class X402Error extends Error {
    abstract readonly code: ErrorCode;

    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
    }
}

export type PaymentHeaderName = 'X-Payment' | 'X-Payment-Requirements';

/** Unparseable wire data. The peer is non-compliant; not retried. */
export class InvalidHeaderError extends X402Error {
    readonly code = ErrorCodes.INVALID_HEADER;

    constructor(
        public readonly header: PaymentHeaderName,
        public readonly reason: string,
        options?: ErrorOptions,
    ) {
        super(`Invalid ${header} header: ${reason}`, options);
    }
}

export class PaymentExpiredError extends X402Error {
    readonly code = ErrorCodes.PAYMENT_EXPIRED;

    constructor(
        public readonly expiresAt: number,
        public readonly currentTime: number,
    ) {
        super(`Payment expired at ${expiresAt} (now ${currentTime})`);
    }
}

export class InsufficientAmountError extends X402Error {
    readonly code = ErrorCodes.INSUFFICIENT_AMOUNT;

    constructor(
        public readonly required: bigint,
        public readonly provided: bigint,
    ) {
        super(`Insufficient amount: required ${required}, got ${provided}`);
    }
}

export type InvalidSignatureReason =
    | 'recipient mismatch'
    | 'chain mismatch'
    | 'recovery failed'
    | 'payer mismatch';

/** Security-relevant rejection. Never retried automatically. */
export class InvalidSignatureError extends X402Error {
    readonly code = ErrorCodes.INVALID_SIGNATURE;

    constructor(
        public readonly reason: InvalidSignatureReason,
        public readonly expected?: string,
        public readonly actual?: string,
        options?: ErrorOptions,
    ) {
        super(
            expected !== undefined || actual !== undefined
                ? `Invalid signature: ${reason} (expected ${expected ?? 'n/a'}, got ${actual ?? 'n/a'})`
                : `Invalid signature: ${reason}`,
            options,
        );
    }
}

export class TransportError extends X402Error {
    readonly code = ErrorCodes.TRANSPORT_ERROR;

    constructor(
        public readonly url: string,
        message: string,
        options?: ErrorOptions,
    ) {
        super(message, options);
    }
}

export class EncodingError extends X402Error {
    readonly code = ErrorCodes.ENCODING_ERROR;
}

export class UnsupportedNetworkError extends X402Error {
    readonly code = ErrorCodes.UNSUPPORTED_NETWORK;

    constructor(public readonly network: string) {
        super(`Unsupported network: ${network}`);
    }
}
