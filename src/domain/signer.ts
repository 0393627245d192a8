import type { Address, Hex, PaymentPayload } from './types.js';

/**
 * Signing capability consumed by the client. Implementations never
 * expose key material: only the signature and the signer's address.
 */
export interface IPaymentSigner {
    /** 65-byte r ‖ s ‖ v signature over the payload's message hash, low-s. */
    sign(payload: PaymentPayload): Promise<Hex>;
    /** Checksummed address of the signing key. */
    getAddress(): Promise<Address>;
}
