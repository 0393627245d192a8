import express, { NextFunction, Request, Response } from 'express';
import { pathToFileURL } from 'node:url';
import { getAddress, isAddress } from 'viem';
import { ZodError } from 'zod';
import { pino } from 'pino';
import { config } from './config.js';
import { UnsupportedNetworkError, X402Error } from './domain/errors.js';
import { parseNetwork } from './domain/network.js';
import { VerifyRequestSchema } from './domain/schemas.js';
import type { VerifyRequest, VerifyResponse } from './domain/types.js';
import type { IKmsKeyClient } from './signers/kms.js';
import { createSigner } from './signers/index.js';
import { PaymentClient, type PaymentClientOptions } from './services/client.js';
import { requirePayment, type PaywallOptions } from './services/paywall.js';
import { Verifier } from './services/verifier.js';

export * from './domain/errors.js';
export * from './domain/network.js';
export * from './domain/types.js';
export type { IPaymentSigner } from './domain/signer.js';
export * from './services/codec.js';
export { paymentMessage, messageHash } from './services/message.js';
export { Verifier, nowSeconds } from './services/verifier.js';
export * from './services/client.js';
export * from './services/paywall.js';
export * from './signers/index.js';

const logger = pino({
    level: config.logLevel,
});

export function createServer(dependencies: { pricing: PaywallOptions }) {
    const { pricing } = dependencies;
    const app = express();
    app.use(express.json());

    app.get('/health', (_req: Request, res: Response) => {
        res.json({ status: 'ok' });
    });

    app.post('/verify', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const validated: VerifyRequest = VerifyRequestSchema.parse(req.body);
            const payer = await Verifier.verify(validated.paymentHeader, validated.requirements);
            const result: VerifyResponse = { isValid: true, payer };
            res.json(result);
        } catch (error) {
            if (error instanceof X402Error) {
                logger.warn({ error: error.message, code: error.code }, 'Verify request failed');
                res.status(400).json({ error: error.message, code: error.code });
                return;
            }
            if (error instanceof ZodError) {
                logger.warn({ issues: error.issues.length }, 'Verify request malformed');
                res.status(400).json({ error: error.issues.map((issue) => issue.message).join('; '), code: 'BAD_REQUEST' });
                return;
            }
            next(error);
        }
    });

    app.get('/api/premium', requirePayment(pricing), (_req: Request, res: Response) => {
        res.json({ data: 'premium content', payer: res.locals.payer });
    });

    app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
        logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Unhandled request error');
        res.status(500).json({ error: 'Internal server error' });
    });

    return app;
}

/** Pricing for the paid route, read from the environment. */
export function pricingFromConfig(settings = config): PaywallOptions {
    const network = parseNetwork(settings.network);
    if (!network) {
        throw new UnsupportedNetworkError(settings.network);
    }
    if (!isAddress(settings.payTo, { strict: false })) {
        throw new Error(`PAY_TO must be a 20-byte hex address, got "${settings.payTo}"`);
    }
    if (!/^\d+$/.test(settings.price)) {
        throw new Error(`PRICE must be a non-negative integer, got "${settings.price}"`);
    }
    return {
        amount: BigInt(settings.price),
        recipient: getAddress(settings.payTo),
        network,
        description: settings.resourceDescription,
        ttlSeconds: settings.requirementsTtlSeconds,
    };
}

/** Paying client wired to the configured signer backend. */
export function createPaymentClient(
    overrides: Partial<PaymentClientOptions> = {},
    kmsClient?: IKmsKeyClient,
): PaymentClient {
    return new PaymentClient({
        maxAmount: config.maxAmount,
        autoPay: config.autoPay,
        timeoutMs: config.timeoutMs,
        ...overrides,
        signer: overrides.signer ?? createSigner(config, kmsClient),
    });
}

async function start() {
    const pricing = pricingFromConfig();
    const app = createServer({ pricing });
    app.listen(config.port, () => {
        logger.info(
            { port: config.port, network: pricing.network, price: pricing.amount.toString() },
            'x402 paygate started',
        );
    });
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
    start().catch((err: unknown) => {
        logger.error({ error: err instanceof Error ? err.message : String(err) }, 'Failed to start server');
        process.exit(1);
    });
}
