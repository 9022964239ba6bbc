// src/constants/launch-constants.ts

const WAD = 10n ** 18n;

/**
 * Token economics shared by every curve. All quantities are 18-decimal base units.
 */
export const LAUNCH_CONSTANTS = {
  // Token Distribution
  TOTAL_SUPPLY: 1_000_000_000n * WAD,       // 1B tokens total
  CURVE_SUPPLY: 800_000_000n * WAD,         // 800M sold on the curve
  LIQUIDITY_SUPPLY: 200_000_000n * WAD,     // 200M reserved for the DEX pool
  TOKEN_DECIMALS: 18,

  // Initial virtual reserves; the token side must exceed CURVE_SUPPLY for the curve to fill
  INITIAL_VIRTUAL_ETH: 1n * WAD,            // 1 ETH
  INITIAL_VIRTUAL_TOKENS: 1_073_000_000n * WAD,

  // Fees
  BPS_DENOMINATOR: 10_000n,
  PLATFORM_FEE_BPS: 100,                    // 1% on buys and sells
  DEFAULT_CREATOR_FEE_BPS: 100,             // 1% on buys only
  MAX_CREATOR_FEE_BPS: 500,
  CREATION_FEE: 1_000_000_000_000_000n,     // 0.001 ETH

  // Fixed point
  PRICE_PRECISION: WAD,

  // Integer widths reserves are checked against
  U128_MAX: (1n << 128n) - 1n,
  U256_MAX: (1n << 256n) - 1n,

  ZERO_ADDRESS: '0x0000000000000000000000000000000000000000'
} as const;

export type LaunchConstants = typeof LAUNCH_CONSTANTS;
