import type { Address, Hex } from 'viem';
import type { NetworkId } from './network.js';

export type { Address, Hex };

/** Server-issued description of what a resource costs. */
export interface PaymentRequirements {
    amount: bigint; // smallest currency unit
    recipient: Address;
    network: NetworkId;
    token?: Address; // absent = native asset
    description?: string;
    expiresAt?: number; // unix seconds
    resource: string;
}

/** Unsigned record of one payment attempt, built by the client. */
export interface PaymentPayload {
    amount: bigint;
    recipient: Address;
    payer: Address;
    chainId: number;
    token?: Address;
    resource: string;
    nonce: number;
    expiresAt: number;
}

export interface SignedPayment {
    payment: PaymentPayload;
    signature: Hex; // r (32) ‖ s (32) ‖ v (1)
}

export interface VerifyRequest {
    paymentHeader: string;
    requirements: PaymentRequirements;
}

export interface VerifyResponse {
    isValid: true;
    payer: Address;
}
