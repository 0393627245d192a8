import { pino } from 'pino';
import { TransportError } from '../domain/errors.js';
import { toChainId } from '../domain/network.js';
import type { IPaymentSigner } from '../domain/signer.js';
import type { PaymentPayload, PaymentRequirements, SignedPayment } from '../domain/types.js';
import {
    X402_PAYMENT_HEADER,
    X402_REQUIREMENTS_HEADER,
    decodeRequirementsHeader,
    encodePaymentHeader,
} from './codec.js';
import { nowSeconds } from './verifier.js';

const logger = pino();

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export const DEFAULT_PAYMENT_TTL_SECONDS = 300;
export const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * Per-client nonce source. Increments are synchronous, so concurrent
 * payment attempts on one client never observe the same value.
 */
export class NonceCounter {
    constructor(private value: number = Date.now()) { }

    next(): number {
        this.value += 1;
        return this.value;
    }
}

export type PaymentRejectReason = 'invalid requirements' | 'amount exceeds ceiling';

export interface PaymentClientHooks {
    /** A 402 with decodable requirements arrived, before any ceiling check. */
    onPaymentRequired?: (url: string, requirements: PaymentRequirements) => void;
    /** A payment was signed; the retry is about to be sent. */
    onPaymentSigned?: (url: string, payment: SignedPayment) => void;
    /** The 402 is returned to the caller unpaid. */
    onPaymentRejected?: (url: string, reason: PaymentRejectReason) => void;
}

export interface PaymentClientOptions {
    signer: IPaymentSigner;
    fetch?: typeof globalThis.fetch;
    /** Largest amount paid without asking; undefined means no ceiling. */
    maxAmount?: bigint;
    autoPay?: boolean;
    /** Budget for each network call, applied to the original and the retry separately. */
    timeoutMs?: number;
    baseUrl?: string;
    initialNonce?: number;
    /** Clock in unix seconds. */
    now?: () => number;
    hooks?: PaymentClientHooks;
}

/**
 * HTTP client that answers a 402 carrying `X-Payment-Requirements` with
 * one signed payment and one retry. Any other outcome returns the last
 * response untouched.
 */
export class PaymentClient {
    private readonly signer: IPaymentSigner;
    private readonly fetchImpl: typeof globalThis.fetch;
    private readonly maxAmount?: bigint;
    private readonly autoPay: boolean;
    private readonly timeoutMs: number;
    private readonly baseUrl?: string;
    private readonly nonces: NonceCounter;
    private readonly now: () => number;
    private readonly hooks: PaymentClientHooks;

    constructor(options: PaymentClientOptions) {
        this.signer = options.signer;
        this.fetchImpl = options.fetch ?? globalThis.fetch;
        this.maxAmount = options.maxAmount;
        this.autoPay = options.autoPay ?? true;
        this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
        this.baseUrl = options.baseUrl;
        this.nonces = new NonceCounter(options.initialNonce);
        this.now = options.now ?? nowSeconds;
        this.hooks = options.hooks ?? {};
    }

    async request(method: string, url: string | URL, init: RequestInit = {}): Promise<Response> {
        const target = this.resolve(url);
        const requestInit: RequestInit = { ...init, method };

        // Idle -> Sent
        const response = await this.send(target, requestInit);

        // Sent -> Done
        if (response.status !== 402 || !this.autoPay) {
            return response;
        }
        const header = response.headers.get(X402_REQUIREMENTS_HEADER);
        if (!header) {
            return response;
        }

        // Sent -> AwaitingPayment
        let requirements: PaymentRequirements;
        try {
            requirements = decodeRequirementsHeader(header);
        } catch (error) {
            logger.warn({ url: target, error: errorMessage(error) }, 'Ignoring undecodable payment requirements');
            this.hooks.onPaymentRejected?.(target, 'invalid requirements');
            return response;
        }
        this.hooks.onPaymentRequired?.(target, requirements);

        // AwaitingPayment -> Done (reject)
        if (this.maxAmount !== undefined && requirements.amount > this.maxAmount) {
            logger.info(
                { url: target, amount: requirements.amount.toString(), maxAmount: this.maxAmount.toString() },
                'Payment amount exceeds ceiling, returning 402',
            );
            this.hooks.onPaymentRejected?.(target, 'amount exceeds ceiling');
            return response;
        }

        // AwaitingPayment -> Paying -> Retried
        let signed: SignedPayment;
        try {
            signed = await this.pay(requirements);
        } finally {
            // The unpaid response is done with either way.
            await response.body?.cancel().catch((error: unknown) => {
                logger.debug({ url: target, error: errorMessage(error) }, 'Could not discard 402 body');
            });
        }
        this.hooks.onPaymentSigned?.(target, signed);

        const headers = new Headers(init.headers);
        headers.set(X402_PAYMENT_HEADER, encodePaymentHeader(signed));
        logger.info(
            { url: target, amount: signed.payment.amount.toString(), nonce: signed.payment.nonce },
            'Retrying with payment',
        );

        // Retried -> Done, whatever the status
        return this.send(target, { ...requestInit, headers });
    }

    get(url: string | URL, init?: RequestInit): Promise<Response> {
        return this.request('GET', url, init);
    }

    post(url: string | URL, init?: RequestInit): Promise<Response> {
        return this.request('POST', url, init);
    }

    put(url: string | URL, init?: RequestInit): Promise<Response> {
        return this.request('PUT', url, init);
    }

    delete(url: string | URL, init?: RequestInit): Promise<Response> {
        return this.request('DELETE', url, init);
    }

    /** Builds and signs the payload for one payment attempt. */
    async pay(requirements: PaymentRequirements): Promise<SignedPayment> {
        const payer = await this.signer.getAddress();
        const payment: PaymentPayload = {
            amount: requirements.amount,
            recipient: requirements.recipient,
            payer,
            chainId: toChainId(requirements.network),
            ...(requirements.token ? { token: requirements.token } : {}),
            resource: requirements.resource,
            nonce: this.nonces.next(),
            expiresAt: requirements.expiresAt ?? this.now() + DEFAULT_PAYMENT_TTL_SECONDS,
        };

        try {
            const signature = await this.signer.sign(payment);
            return { payment, signature };
        } catch (error) {
            logger.error({ payer, nonce: payment.nonce, error: errorMessage(error) }, 'Signer failed');
            throw error;
        }
    }

    private resolve(url: string | URL): string {
        return this.baseUrl ? new URL(url, this.baseUrl).toString() : url.toString();
    }

    private async send(url: string, init: RequestInit): Promise<Response> {
        const callerSignal = init.signal ?? undefined;
        const controller = new AbortController();
        const onAbort = () => controller.abort(callerSignal?.reason);
        if (callerSignal?.aborted) {
            controller.abort(callerSignal.reason);
        } else {
            callerSignal?.addEventListener('abort', onAbort, { once: true });
        }
        const timer = setTimeout(() => controller.abort(), this.timeoutMs);

        try {
            return await this.fetchImpl(url, { ...init, signal: controller.signal });
        } catch (error) {
            // Cancellation by the caller is theirs to handle; everything else is transport.
            if (callerSignal?.aborted) {
                throw error;
            }
            if (controller.signal.aborted) {
                logger.warn({ url, timeoutMs: this.timeoutMs }, 'Request timed out');
                throw new TransportError(url, `Request to ${url} timed out after ${this.timeoutMs}ms`, { cause: error });
            }
            throw new TransportError(url, `Request to ${url} failed: ${errorMessage(error)}`, { cause: error });
        } finally {
            clearTimeout(timer);
            callerSignal?.removeEventListener('abort', onAbort);
        }
    }
}
