import request from 'supertest';
import { describe, it, expect, beforeEach } from 'vitest';
import { createServer } from '../../src/index.js';
import { PaymentClient } from '../../src/services/client.js';
import { decodeRequirementsHeader, encodePaymentHeader } from '../../src/services/codec.js';
import { nowSeconds } from '../../src/services/verifier.js';
import { LocalSigner } from '../../src/signers/local.js';
import type { PaymentPayload, PaymentRequirements } from '../../src/domain/types.js';

type FetchArgs = Parameters<typeof globalThis.fetch>;

describe('API E2E Tests', () => {
    let app: ReturnType<typeof createServer>;

    const alice = LocalSigner.fromPrivateKey(`0x${'01'.repeat(32)}`);
    const bob = '0x2222222222222222222222222222222222222222';
    const resource = 'https://api.example.com/premium';

    beforeEach(() => {
        app = createServer({
            pricing: { amount: 1000n, recipient: bob, network: 'base', description: 'Premium API access', resource },
        });
    });

    const createPaymentHeader = async (overrides: Partial<PaymentPayload> = {}): Promise<string> => {
        const payment: PaymentPayload = {
            amount: 1000n,
            recipient: bob,
            payer: await alice.getAddress(),
            chainId: 8453,
            resource,
            nonce: 1,
            expiresAt: nowSeconds() + 300,
            ...overrides,
        };
        return encodePaymentHeader({ payment, signature: await alice.sign(payment) });
    };

    const requirementsWire = {
        amount: '1000',
        recipient: bob,
        network: 'base',
        resource,
    };

    it('should report health', async () => {
        const response = await request(app).get('/health');
        expect(response.status).toBe(200);
        expect(response.body).toEqual({ status: 'ok' });
    });

    describe('paid route', () => {
        it('should answer an unpaid request with 402 and requirements', async () => {
            const before = nowSeconds();
            const response = await request(app).get('/api/premium');

            expect(response.status).toBe(402);
            const requirements = decodeRequirementsHeader(response.get('X-Payment-Requirements') ?? '');
            expect(requirements).toMatchObject({
                amount: 1000n,
                recipient: bob,
                network: 'base',
                description: 'Premium API access',
                resource,
            });
            expect(requirements.expiresAt).toBeGreaterThanOrEqual(before + 300);
            expect(response.body).toMatchObject({ error: 'Payment required', requirements: { amount: '1000' } });
        });

        it('should serve a request carrying a valid payment', async () => {
            const response = await request(app).get('/api/premium').set('X-Payment', await createPaymentHeader());

            expect(response.status).toBe(200);
            expect(response.body).toEqual({ data: 'premium content', payer: await alice.getAddress() });
        });

        it('should answer an underpayment with a fresh 402', async () => {
            const response = await request(app)
                .get('/api/premium')
                .set('X-Payment', await createPaymentHeader({ amount: 999n }));

            expect(response.status).toBe(402);
            expect(response.get('X-Payment-Requirements')).toBeTruthy();
            expect(response.body).toMatchObject({
                code: 'INSUFFICIENT_AMOUNT',
                error: 'Insufficient amount: required 1000, got 999',
            });
        });

        it('should answer an expired payment with a fresh 402', async () => {
            const response = await request(app)
                .get('/api/premium')
                .set('X-Payment', await createPaymentHeader({ expiresAt: 1000 }));

            expect(response.status).toBe(402);
            expect(response.body.code).toBe('PAYMENT_EXPIRED');
        });

        it('should reject a payment signed by someone other than the declared payer', async () => {
            const response = await request(app)
                .get('/api/premium')
                .set('X-Payment', await createPaymentHeader({ payer: '0x4444444444444444444444444444444444444444' }));

            expect(response.status).toBe(401);
            expect(response.body.code).toBe('INVALID_SIGNATURE');
        });

        it('should reject a malformed payment header', async () => {
            const response = await request(app).get('/api/premium').set('X-Payment', 'not base64!');

            expect(response.status).toBe(400);
            expect(response.body).toEqual({
                error: 'Invalid X-Payment header: base64 decode failed',
                code: 'INVALID_HEADER',
            });
        });
    });

    describe('/verify', () => {
        it('should return 400 for an invalid verify request', async () => {
            const response = await request(app).post('/verify').send({});

            expect(response.status).toBe(400);
            expect(response.body.code).toBe('BAD_REQUEST');
        });

        it('should verify a valid payment', async () => {
            const response = await request(app)
                .post('/verify')
                .send({ paymentHeader: await createPaymentHeader(), requirements: requirementsWire });

            expect(response.status).toBe(200);
            expect(response.body).toEqual({ isValid: true, payer: await alice.getAddress() });
        });

        it('should fail verification if the amount is insufficient', async () => {
            const response = await request(app)
                .post('/verify')
                .send({ paymentHeader: await createPaymentHeader({ amount: 500n }), requirements: requirementsWire });

            expect(response.status).toBe(400);
            expect(response.body).toEqual({
                error: 'Insufficient amount: required 1000, got 500',
                code: 'INSUFFICIENT_AMOUNT',
            });
        });
    });

    describe('client round trip', () => {
        // Routes the client's fetch through supertest so no socket is opened.
        const bridge = async (...[input, init]: FetchArgs): Promise<Response> => {
            const url = new URL(typeof input === 'string' ? input : input instanceof URL ? input.href : input.url);
            let pending = request(app).get(url.pathname);
            new Headers(init?.headers).forEach((value, key) => {
                pending = pending.set(key, value);
            });
            const response = await pending;

            const headers = new Headers({ 'Content-Type': 'application/json' });
            const requirementsHeader = response.get('X-Payment-Requirements');
            if (requirementsHeader) headers.set('X-Payment-Requirements', requirementsHeader);
            return new Response(JSON.stringify(response.body), { status: response.status, headers });
        };

        it('should pay for the premium route and receive the content', async () => {
            const seen: PaymentRequirements[] = [];
            const client = new PaymentClient({
                signer: alice,
                fetch: bridge,
                baseUrl: 'http://paygate.test',
                hooks: { onPaymentRequired: (_url, requirements) => seen.push(requirements) },
            });

            const response = await client.get('/api/premium');

            expect(response.status).toBe(200);
            expect(await response.json()).toEqual({ data: 'premium content', payer: await alice.getAddress() });
            expect(seen).toHaveLength(1);
            expect(seen[0].amount).toBe(1000n);
        });

        it('should leave the 402 in place when the price exceeds the ceiling', async () => {
            const client = new PaymentClient({
                signer: alice,
                fetch: bridge,
                baseUrl: 'http://paygate.test',
                maxAmount: 10n,
            });

            const response = await client.get('/api/premium');

            expect(response.status).toBe(402);
        });
    });
});
