import dotenv from 'dotenv';

dotenv.config();

function optionalBigInt(name: string): bigint | undefined {
    const raw = process.env[name];
    if (raw === undefined || raw === '') return undefined;
    if (!/^\d+$/.test(raw)) {
        throw new Error(`${name} must be a non-negative integer, got "${raw}"`);
    }
    return BigInt(raw);
}

function bool(name: string, fallback: boolean): boolean {
    const raw = process.env[name];
    if (raw === undefined || raw === '') return fallback;
    return raw === 'true' || raw === '1';
}

export type SignerBackend = 'local' | 'kms';

function signerBackend(): SignerBackend {
    const raw = process.env.SIGNER_BACKEND || 'local';
    if (raw !== 'local' && raw !== 'kms') {
        throw new Error(`SIGNER_BACKEND must be "local" or "kms", got "${raw}"`);
    }
    return raw;
}

export const config = {
    port: parseInt(process.env.PORT || '3000', 10),
    logLevel: process.env.LOG_LEVEL || 'info',

    // Requirements issued by the server
    network: process.env.NETWORK || 'base_sepolia',
    payTo: process.env.PAY_TO || '0x0000000000000000000000000000000000000000',
    price: process.env.PRICE || '1000',
    resourceDescription: process.env.RESOURCE_DESCRIPTION || 'Premium API access',
    requirementsTtlSeconds: parseInt(process.env.REQUIREMENTS_TTL_SECONDS || '300', 10),

    // Signing backend
    signerBackend: signerBackend(),
    privateKey: process.env.X402_PRIVATE_KEY,
    kmsKeyId: process.env.KMS_KEY_ID,
    awsRegion: process.env.AWS_REGION,

    // Paying client
    maxAmount: optionalBigInt('X402_MAX_AMOUNT'),
    autoPay: bool('X402_AUTO_PAY', true),
    timeoutMs: parseInt(process.env.X402_TIMEOUT_MS || '30000', 10),
};

export type AppConfig = typeof config;
