import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { pino } from 'pino';
import { ErrorCodes, X402Error } from '../domain/errors.js';
import type { NetworkId } from '../domain/network.js';
import type { Address, PaymentRequirements } from '../domain/types.js';
import { X402_PAYMENT_HEADER, X402_REQUIREMENTS_HEADER, encodeRequirementsHeader, toRequirementsWire } from './codec.js';
import { Verifier, nowSeconds } from './verifier.js';

const logger = pino();

export const DEFAULT_REQUIREMENTS_TTL_SECONDS = 300;

export interface RequirementsOptions {
    amount: bigint;
    recipient: Address;
    network: NetworkId;
    resource: string;
    token?: Address;
    description?: string;
    expiresAt?: number;
}

/** Fresh requirements for one request; expiry defaults to now + 300s. */
export function buildRequirements(
    options: RequirementsOptions,
    now: number = nowSeconds(),
    ttlSeconds: number = DEFAULT_REQUIREMENTS_TTL_SECONDS,
): PaymentRequirements {
    return {
        amount: options.amount,
        recipient: options.recipient,
        network: options.network,
        ...(options.token ? { token: options.token } : {}),
        ...(options.description !== undefined ? { description: options.description } : {}),
        expiresAt: options.expiresAt ?? now + ttlSeconds,
        resource: options.resource,
    };
}

export interface PaywallOptions extends Omit<RequirementsOptions, 'resource' | 'expiresAt'> {
    /** Defaults to the request URL without its query string. */
    resource?: string;
    ttlSeconds?: number;
    now?: () => number;
}

const STATUS_BY_CODE: Partial<Record<X402Error['code'], number>> = {
    [ErrorCodes.INVALID_HEADER]: 400,
    [ErrorCodes.INVALID_SIGNATURE]: 401,
    [ErrorCodes.PAYMENT_EXPIRED]: 402,
    [ErrorCodes.INSUFFICIENT_AMOUNT]: 402,
};

function resourceOf(req: Request): string {
    const path = req.originalUrl.split('?')[0];
    return `${req.protocol}://${req.get('host')}${path}`;
}

function sendPaymentRequired(res: Response, requirements: PaymentRequirements, error?: X402Error) {
    res.status(402)
        .set(X402_REQUIREMENTS_HEADER, encodeRequirementsHeader(requirements))
        .json({
            error: error ? error.message : 'Payment required',
            ...(error ? { code: error.code } : {}),
            requirements: toRequirementsWire(requirements),
        });
}

/**
 * Guards a route behind a payment. Requests without `X-Payment` get a 402
 * carrying the requirements; paid requests are verified and the recovered
 * payer is exposed as `res.locals.payer`.
 */
export function requirePayment(options: PaywallOptions): RequestHandler {
    const clock = options.now ?? nowSeconds;

    return async (req: Request, res: Response, next: NextFunction) => {
        try {
            const requirements = buildRequirements(
                { ...options, resource: options.resource ?? resourceOf(req) },
                clock(),
                options.ttlSeconds,
            );

            const paymentHeader = req.get(X402_PAYMENT_HEADER);
            if (!paymentHeader) {
                sendPaymentRequired(res, requirements);
                return;
            }

            try {
                res.locals.payer = await Verifier.verify(paymentHeader, requirements, clock());
            } catch (error) {
                if (!(error instanceof X402Error)) throw error;

                logger.warn({ code: error.code, error: error.message, resource: requirements.resource }, 'Payment rejected');
                const status = STATUS_BY_CODE[error.code] ?? 400;
                if (status === 402) {
                    sendPaymentRequired(res, requirements, error);
                } else {
                    res.status(status).json({ error: error.message, code: error.code });
                }
                return;
            }
        } catch (error) {
            next(error);
            return;
        }
        next();
    };
}
