// src/curve/price-engine.ts

import { LAUNCH_CONSTANTS } from '../constants/launch-constants';
import { CurveState, FeeSplit } from '../types';
import {
  CurveArithmeticError,
  CurveMigratedError,
  SlippageExceededError,
  ValidationError
} from '../types/errors';

const { BPS_DENOMINATOR, CURVE_SUPPLY, PRICE_PRECISION, U128_MAX, U256_MAX } = LAUNCH_CONSTANTS;

/**
 * Constant-product bonding curve math over virtual reserves.
 *
 * Every function here is pure: it reads a CurveState snapshot and returns new values,
 * never mutating its input. Callers persist the returned state only after all checks pass.
 */

export interface FeeSchedule {
  platformFeeBps: number;
}

export const DEFAULT_FEE_SCHEDULE: FeeSchedule = {
  platformFeeBps: LAUNCH_CONSTANTS.PLATFORM_FEE_BPS
};

export interface BuyResult {
  state: CurveState;
  tokensOut: bigint;
  fees: FeeSplit;
  // Gross ETH actually consumed; less than ethIn when the buy was clamped
  ethUsed: bigint;
  refund: bigint;
  migrationTriggered: boolean;
  priceImpactBps: number;
  price: bigint;
}

export interface SellResult {
  state: CurveState;
  ethOut: bigint;
  grossEthOut: bigint;
  fee: bigint;
  priceImpactBps: number;
  price: bigint;
}

export function ceilDiv(numerator: bigint, denominator: bigint): bigint {
  if (denominator <= 0n) {
    throw new CurveArithmeticError('Division by zero');
  }
  if (numerator === 0n) return 0n;
  return (numerator + denominator - 1n) / denominator;
}

function checkU128(value: bigint, label: string): bigint {
  if (value < 0n) {
    throw new CurveArithmeticError(`${label} underflow`);
  }
  if (value > U128_MAX) {
    throw new CurveArithmeticError(`${label} overflows u128`);
  }
  return value;
}

function checkedMul(a: bigint, b: bigint, label: string): bigint {
  const product = a * b;
  if (product > U256_MAX) {
    throw new CurveArithmeticError(`${label} overflows u256`);
  }
  return product;
}

function requirePositive(value: bigint, label: string): void {
  if (value <= 0n) {
    throw new ValidationError(`${label} must be greater than zero`);
  }
}

function requireBps(value: number, label: string): void {
  if (!Number.isInteger(value) || value < 0 || value > Number(BPS_DENOMINATOR)) {
    throw new ValidationError(`${label} must be an integer between 0 and ${BPS_DENOMINATOR}`);
  }
}

export function initialCurveState(
  creatorFeeBps: number,
  virtualEth: bigint = LAUNCH_CONSTANTS.INITIAL_VIRTUAL_ETH,
  virtualTokens: bigint = LAUNCH_CONSTANTS.INITIAL_VIRTUAL_TOKENS
): CurveState {
  requireBps(creatorFeeBps, 'creatorFeeBps');
  requirePositive(virtualEth, 'virtualEth');
  if (virtualTokens <= CURVE_SUPPLY) {
    throw new ValidationError(`virtualTokens must exceed the curve supply of ${CURVE_SUPPLY}`);
  }

  return {
    virtualEth: checkU128(virtualEth, 'virtualEth'),
    virtualTokens: checkU128(virtualTokens, 'virtualTokens'),
    totalSupply: 0n,
    creatorFeeBps,
    lastUpdateSeq: 0
  };
}

export function quoteBuy(state: CurveState, ethIn: bigint): bigint {
  if (ethIn < 0n) {
    throw new ValidationError('ethIn must not be negative');
  }
  const denominator = checkU128(state.virtualEth + ethIn, 'virtualEth + ethIn');
  if (denominator === 0n) {
    throw new CurveArithmeticError('virtualEth + ethIn is zero');
  }
  return ceilDiv(checkedMul(state.virtualTokens, ethIn, 'virtualTokens * ethIn'), denominator);
}

export function quoteSell(state: CurveState, tokensIn: bigint): bigint {
  if (tokensIn < 0n) {
    throw new ValidationError('tokensIn must not be negative');
  }
  const denominator = checkU128(state.virtualTokens + tokensIn, 'virtualTokens + tokensIn');
  if (denominator === 0n) {
    throw new CurveArithmeticError('virtualTokens + tokensIn is zero');
  }
  const ethOut = ceilDiv(checkedMul(state.virtualEth, tokensIn, 'virtualEth * tokensIn'), denominator);
  return ethOut > state.virtualEth ? state.virtualEth : ethOut;
}

/**
 * Inverse of quoteBuy: ETH needed on the curve side to take exactly tokensOut.
 */
export function calculateEthIn(state: CurveState, tokensOut: bigint): bigint {
  if (tokensOut < 0n) {
    throw new ValidationError('tokensOut must not be negative');
  }
  const remaining = state.virtualTokens - tokensOut;
  if (remaining <= 0n) {
    throw new CurveArithmeticError(
      `Cannot take ${tokensOut} tokens from a virtual reserve of ${state.virtualTokens}`
    );
  }
  return ceilDiv(checkedMul(state.virtualEth, tokensOut, 'virtualEth * tokensOut'), remaining);
}

export function currentPrice(state: CurveState): bigint {
  if (state.virtualTokens === 0n) {
    throw new CurveArithmeticError('virtualTokens is zero');
  }
  return checkedMul(state.virtualEth, PRICE_PRECISION, 'virtualEth * 1e18') / state.virtualTokens;
}

export function progressBps(state: CurveState): number {
  if (state.totalSupply >= CURVE_SUPPLY) return Number(BPS_DENOMINATOR);
  return Number((state.totalSupply * BPS_DENOMINATOR) / CURVE_SUPPLY);
}

export function marketCap(state: CurveState): bigint {
  return (state.totalSupply * currentPrice(state)) / PRICE_PRECISION;
}

// Shortfall of the realized amount against a trade at the pre-trade spot price
function impactBps(spotAmount: bigint, realized: bigint): number {
  if (spotAmount <= 0n || realized >= spotAmount) return 0;
  return Number(((spotAmount - realized) * BPS_DENOMINATOR) / spotAmount);
}

export function buyPriceImpactBps(state: CurveState, ethForCurve: bigint, tokensOut: bigint): number {
  if (state.virtualEth === 0n) return 0;
  return impactBps((ethForCurve * state.virtualTokens) / state.virtualEth, tokensOut);
}

export function sellPriceImpactBps(state: CurveState, tokensIn: bigint, grossEthOut: bigint): number {
  if (state.virtualTokens === 0n) return 0;
  return impactBps((tokensIn * state.virtualEth) / state.virtualTokens, grossEthOut);
}

export function splitBuyFees(ethIn: bigint, creatorFeeBps: number, fees: FeeSchedule = DEFAULT_FEE_SCHEDULE): FeeSplit {
  const platformFee = (ethIn * BigInt(fees.platformFeeBps)) / BPS_DENOMINATOR;
  const creatorFee = (ethIn * BigInt(creatorFeeBps)) / BPS_DENOMINATOR;
  return {
    platformFee,
    creatorFee,
    ethForCurve: ethIn - platformFee - creatorFee
  };
}

export function applyBuy(
  state: CurveState,
  ethIn: bigint,
  minTokensOut: bigint,
  maxSlippageBps: number,
  fees: FeeSchedule = DEFAULT_FEE_SCHEDULE
): BuyResult {
  requirePositive(ethIn, 'ethIn');
  if (minTokensOut < 0n) {
    throw new ValidationError('minTokensOut must not be negative');
  }
  requireBps(maxSlippageBps, 'maxSlippageBps');
  requireBps(fees.platformFeeBps + state.creatorFeeBps, 'total fee bps');

  const headroom = CURVE_SUPPLY - state.totalSupply;
  if (headroom <= 0n) {
    throw new CurveMigratedError('Curve supply is exhausted');
  }
  // Buys only approach virtualTokens, so the clamp below needs the reserve to exceed the headroom
  if (state.virtualTokens <= headroom) {
    throw new CurveArithmeticError(
      `Virtual token reserve ${state.virtualTokens} cannot cover the remaining curve supply ${headroom}`
    );
  }

  let split = splitBuyFees(ethIn, state.creatorFeeBps, fees);
  if (split.ethForCurve <= 0n) {
    throw new ValidationError('ethIn is too small to cover fees');
  }

  let tokensOut = quoteBuy(state, split.ethForCurve);
  let curveCost = split.ethForCurve;
  let ethUsed = ethIn;
  let migrationTriggered = false;

  if (tokensOut >= headroom) {
    // Clamp to the remaining supply and charge only what that amount costs
    tokensOut = headroom;
    migrationTriggered = true;
    curveCost = calculateEthIn(state, tokensOut);

    const feeBps = BigInt(fees.platformFeeBps + state.creatorFeeBps);
    const grossNeeded = ceilDiv(curveCost * BPS_DENOMINATOR, BPS_DENOMINATOR - feeBps);
    ethUsed = grossNeeded < ethIn ? grossNeeded : ethIn;
    split = splitBuyFees(ethUsed, state.creatorFeeBps, fees);
  }

  if (tokensOut < minTokensOut) {
    throw new SlippageExceededError(
      `Buy returns ${tokensOut} tokens, below minimum ${minTokensOut}`,
      minTokensOut,
      tokensOut
    );
  }

  const impact = buyPriceImpactBps(state, curveCost, tokensOut);
  if (impact > maxSlippageBps) {
    throw new SlippageExceededError(
      `Buy price impact ${impact} bps exceeds ${maxSlippageBps} bps`,
      BigInt(maxSlippageBps),
      BigInt(impact)
    );
  }

  const next: CurveState = {
    ...state,
    virtualEth: checkU128(state.virtualEth + split.ethForCurve, 'virtualEth'),
    virtualTokens: checkU128(state.virtualTokens - tokensOut, 'virtualTokens'),
    totalSupply: state.totalSupply + tokensOut
  };
  if (next.virtualTokens === 0n) {
    throw new CurveArithmeticError('Buy would empty the virtual token reserve');
  }

  return {
    state: next,
    tokensOut,
    fees: split,
    ethUsed,
    refund: ethIn - ethUsed,
    migrationTriggered,
    priceImpactBps: impact,
    price: currentPrice(next)
  };
}

export function applySell(
  state: CurveState,
  tokensIn: bigint,
  minEthOut: bigint,
  maxSlippageBps: number,
  fees: FeeSchedule = DEFAULT_FEE_SCHEDULE
): SellResult {
  requirePositive(tokensIn, 'tokensIn');
  if (minEthOut < 0n) {
    throw new ValidationError('minEthOut must not be negative');
  }
  requireBps(maxSlippageBps, 'maxSlippageBps');
  requireBps(fees.platformFeeBps, 'platformFeeBps');

  if (tokensIn > state.totalSupply) {
    throw new CurveArithmeticError(`Cannot sell ${tokensIn} tokens, only ${state.totalSupply} issued`);
  }

  const grossEthOut = quoteSell(state, tokensIn);
  const fee = (grossEthOut * BigInt(fees.platformFeeBps)) / BPS_DENOMINATOR;
  const ethOut = grossEthOut - fee;

  if (ethOut < minEthOut) {
    throw new SlippageExceededError(
      `Sell returns ${ethOut} wei, below minimum ${minEthOut}`,
      minEthOut,
      ethOut
    );
  }

  const impact = sellPriceImpactBps(state, tokensIn, grossEthOut);
  if (impact > maxSlippageBps) {
    throw new SlippageExceededError(
      `Sell price impact ${impact} bps exceeds ${maxSlippageBps} bps`,
      BigInt(maxSlippageBps),
      BigInt(impact)
    );
  }

  const next: CurveState = {
    ...state,
    virtualEth: checkU128(state.virtualEth - grossEthOut, 'virtualEth'),
    virtualTokens: checkU128(state.virtualTokens + tokensIn, 'virtualTokens'),
    totalSupply: state.totalSupply - tokensIn
  };

  return {
    state: next,
    ethOut,
    grossEthOut,
    fee,
    priceImpactBps: impact,
    price: currentPrice(next)
  };
}
