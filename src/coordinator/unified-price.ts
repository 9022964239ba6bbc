import { LAUNCH_CONSTANTS } from '../constants/launch-constants';
import { CurveRecord } from '../types';
import { CurveArithmeticError } from '../types/errors';

export interface UnifiedPrice {
  price: bigint;
  totalSupply: bigint;
  virtualEth: bigint;
  virtualTokens: bigint;
  chains: number;
}

/**
 * Treats each chain's curve as a shard of one market: reserves and issued supply are summed
 * across every chain that has a curve, and the price is derived from the combined reserves.
 */
export function computeUnifiedPrice(curves: CurveRecord[]): UnifiedPrice {
  if (curves.length === 0) {
    throw new CurveArithmeticError('Cannot price a launch without curves');
  }

  let virtualEth = 0n;
  let virtualTokens = 0n;
  let totalSupply = 0n;
  for (const curve of curves) {
    virtualEth += curve.state.virtualEth;
    virtualTokens += curve.state.virtualTokens;
    totalSupply += curve.state.totalSupply;
  }

  if (virtualTokens === 0n) {
    throw new CurveArithmeticError('Combined virtual token reserve is zero');
  }

  return {
    price: (virtualEth * LAUNCH_CONSTANTS.PRICE_PRECISION) / virtualTokens,
    totalSupply,
    virtualEth,
    virtualTokens,
    chains: curves.length
  };
}
