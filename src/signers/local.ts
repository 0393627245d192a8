import { generatePrivateKey, privateKeyToAccount, type PrivateKeyAccount } from 'viem/accounts';
import type { IPaymentSigner } from '../domain/signer.js';
import type { Address, Hex, PaymentPayload } from '../domain/types.js';
import { messageHash } from '../services/message.js';

/**
 * Keeps the private key in process memory. Meant for development and
 * tests; production deployments should use a key-management backend.
 */
export class LocalSigner implements IPaymentSigner {
    private constructor(private readonly account: PrivateKeyAccount) { }

    static fromPrivateKey(privateKey: Hex): LocalSigner {
        return new LocalSigner(privateKeyToAccount(privateKey));
    }

    static generate(): LocalSigner {
        return new LocalSigner(privateKeyToAccount(generatePrivateKey()));
    }

    async sign(payload: PaymentPayload): Promise<Hex> {
        return this.account.signMessage({ message: { raw: messageHash(payload) } });
    }

    async getAddress(): Promise<Address> {
        return this.account.address;
    }
}
