import { describe, it, expect } from 'vitest';
import {
    NETWORKS,
    fromChainId,
    isNetworkId,
    parseNetwork,
    requireChainId,
    toChainId,
} from '../../src/domain/network.js';
import { UnsupportedNetworkError } from '../../src/domain/errors.js';

describe('Chain directory', () => {
    it('should map every network to its EVM chain id', () => {
        expect(toChainId('ethereum')).toBe(1);
        expect(toChainId('base')).toBe(8453);
        expect(toChainId('base_sepolia')).toBe(84532);
        expect(toChainId('arbitrum')).toBe(42161);
        expect(toChainId('optimism')).toBe(10);
        expect(toChainId('polygon')).toBe(137);
    });

    it('should invert the mapping for every network', () => {
        for (const network of NETWORKS) {
            expect(fromChainId(toChainId(network))).toBe(network);
        }
    });

    it('should return undefined for unknown chain ids', () => {
        expect(fromChainId(999999)).toBeUndefined();
        expect(fromChainId(0)).toBeUndefined();
    });

    it('should parse names case-insensitively and accept the legacy base sepolia spelling', () => {
        expect(parseNetwork('Base')).toBe('base');
        expect(parseNetwork(' POLYGON ')).toBe('polygon');
        expect(parseNetwork('basesepolia')).toBe('base_sepolia');
        expect(parseNetwork('BaseSepolia')).toBe('base_sepolia');
    });

    it('should not treat object prototype keys as networks', () => {
        expect(isNetworkId('constructor')).toBe(false);
        expect(parseNetwork('toString')).toBeUndefined();
        expect(parseNetwork('__proto__')).toBeUndefined();
    });

    it('should throw UnsupportedNetworkError for unknown names', () => {
        expect(requireChainId('optimism')).toBe(10);
        expect(() => requireChainId('solana')).toThrow(UnsupportedNetworkError);
        expect(() => requireChainId('solana')).toThrow('Unsupported network: solana');
    });
});
