import type { ChainTag } from '../models/types';

const EVM_ADDRESS = /^0x[a-fA-F0-9]{40}$/;
const SOLANA_ADDRESS = /^[1-9A-HJ-NP-Za-km-z]{32,44}$/;
const BINANCE_ADDRESS = /^[a-zA-Z0-9]{42}$/;
const POLYGON_ADDRESS = /^0x[a-fA-F0-9]{40}$/;

/**
 * Tag an address with the chain family its shape suggests.
 *
 * Polygon shares the EVM pattern and is checked after Ethereum, so it never
 * matches: every 0x address is reported as Ethereum. Kept as-is until Polygon
 * support is decided (see DESIGN.md).
 */
export function detectChain(address: string): ChainTag {
    const candidate = address.trim();

    if (EVM_ADDRESS.test(candidate)) return 'Ethereum';
    if (SOLANA_ADDRESS.test(candidate)) return 'Solana';
    if (BINANCE_ADDRESS.test(candidate)) return 'Binance';
    if (POLYGON_ADDRESS.test(candidate)) return 'Polygon';
    return 'Unknown';
}

/**
 * Gate for the report pipeline. Narrower than detectChain: only EVM hex and
 * Solana base58 shapes get through.
 */
export function isValidTokenAddress(address: string): boolean {
    const candidate = address.trim();
    return EVM_ADDRESS.test(candidate) || SOLANA_ADDRESS.test(candidate);
}
