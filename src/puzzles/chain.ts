/**
 * Per-chain metadata: display names, symbols, explorer links and the
 * address encodings the validator decodes against.
 */

import type { Chain } from "./schema.js";

export interface ChainInfo {
  /** Ticker symbol */
  symbol: string;
  /** Human-readable name, also the searchable "chain" field */
  displayName: string;
  /** Explorer URL template; "{txid}" is replaced */
  txExplorer: string;
  /** base58check version bytes for P2PKH and P2SH, where the chain uses them */
  p2pkhVersion?: number;
  p2shVersions?: readonly number[];
  /** bech32 human-readable part for segwit addresses */
  bech32Hrp?: string;
  /** Version byte of a WIF-encoded private key */
  wifVersion?: number;
}

export const CHAINS: Readonly<Record<Chain, Readonly<ChainInfo>>> = Object.freeze({
  bitcoin: {
    symbol: "BTC",
    displayName: "Bitcoin",
    txExplorer: "https://mempool.space/tx/{txid}",
    p2pkhVersion: 0x00,
    p2shVersions: [0x05],
    bech32Hrp: "bc",
    wifVersion: 0x80,
  },
  ethereum: {
    symbol: "ETH",
    displayName: "Ethereum",
    txExplorer: "https://etherscan.io/tx/{txid}",
  },
  litecoin: {
    symbol: "LTC",
    displayName: "Litecoin",
    txExplorer: "https://blockchair.com/litecoin/transaction/{txid}",
    p2pkhVersion: 0x30,
    // M-prefixed addresses, plus legacy 3-prefixed ones shared with bitcoin
    p2shVersions: [0x32, 0x05],
    bech32Hrp: "ltc",
    wifVersion: 0xb0,
  },
  monero: {
    symbol: "XMR",
    displayName: "Monero",
    txExplorer: "https://xmrchain.net/tx/{txid}",
  },
  decred: {
    symbol: "DCR",
    displayName: "Decred",
    txExplorer: "https://dcrdata.decred.org/tx/{txid}",
  },
});

export function chainInfo(chain: Chain): Readonly<ChainInfo> {
  return CHAINS[chain];
}

export function chainDisplayName(chain: Chain): string {
  return CHAINS[chain].displayName;
}

export function chainSymbol(chain: Chain): string {
  return CHAINS[chain].symbol;
}

/**
 * Block explorer link for a transaction.
 */
export function txExplorerUrl(chain: Chain, txid: string): string {
  return CHAINS[chain].txExplorer.replace("{txid}", txid);
}
