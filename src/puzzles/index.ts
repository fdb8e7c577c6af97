/**
 * Puzzle record schema and helpers.
 */

export * from "./schema.js";
export {
  CHAINS,
  chainInfo,
  chainDisplayName,
  chainSymbol,
  txExplorerUrl,
  type ChainInfo,
} from "./chain.js";
export {
  keyRange,
  fundingTransaction,
  claimTransaction,
  hasPrivateKey,
  assetUrl,
  parsePuzzleDate,
  formatDuration,
} from "./helpers.js";
