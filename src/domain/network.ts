import { UnsupportedNetworkError } from './errors.js';

export const NETWORKS = ['ethereum', 'base', 'base_sepolia', 'arbitrum', 'optimism', 'polygon'] as const;

export type NetworkId = (typeof NETWORKS)[number];

const CHAIN_IDS: Readonly<Record<NetworkId, number>> = {
    ethereum: 1,
    base: 8453,
    base_sepolia: 84532,
    arbitrum: 42161,
    optimism: 10,
    polygon: 137,
};

// Built once; CHAIN_IDS is injective so the reverse table is lossless.
const NETWORK_BY_CHAIN_ID: ReadonlyMap<number, NetworkId> = new Map(
    NETWORKS.map((network) => [CHAIN_IDS[network], network] as const),
);

const ALIASES: ReadonlyMap<string, NetworkId> = new Map<string, NetworkId>([['basesepolia', 'base_sepolia']]);

export function isNetworkId(value: string): value is NetworkId {
    return Object.prototype.hasOwnProperty.call(CHAIN_IDS, value);
}

export function toChainId(network: NetworkId): number {
    return CHAIN_IDS[network];
}

export function fromChainId(chainId: number): NetworkId | undefined {
    return NETWORK_BY_CHAIN_ID.get(chainId);
}

/**
 * Case-insensitive lookup of a network name, accepting the legacy
 * `basesepolia` spelling. Returns undefined for unknown names.
 */
export function parseNetwork(name: string): NetworkId | undefined {
    const normalized = name.trim().toLowerCase();
    if (isNetworkId(normalized)) return normalized;
    return ALIASES.get(normalized);
}

export function requireChainId(name: string): number {
    const network = parseNetwork(name);
    if (!network) {
        throw new UnsupportedNetworkError(name);
    }
    return toChainId(network);
}
