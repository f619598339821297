import { GlidePath, getTargetPercent } from "../models/GlidePath";
import { FUND_ROLES, PortfolioSnapshot, getTotalBalance } from "../models/Portfolio";
import { FundStrategy, StrategyResult, TradeAction } from "../models/StrategyResult";
import { HOLD_RATIO_LOWER, HOLD_RATIO_UPPER } from "../utils/constants";
import { percentOf, roundToCents } from "../utils/math";
import { selectGlidePath } from "./glidePath";

/**
 * Decides whether to buy, sell or hold a fund so it reaches its target share
 * of the portfolio.
 *
 * A fund is held only when its target/current ratio is strictly inside the
 * tolerance band AND no new money is being invested. Any nonzero new money
 * forces an explicit trade, even for a fund that is already close to target.
 *
 * A fund with a zero balance is bought up to its full target (held if the
 * target is also zero).
 *
 * @param targetPct - Target share of the portfolio (0-100)
 * @param totalAmount - Existing balances plus new money
 * @param currentBalance - The fund's current balance
 * @param moneyToInvest - New money going in (negative when withdrawing)
 */
export function decideTradeAction(
  targetPct: number,
  totalAmount: number,
  currentBalance: number,
  moneyToInvest: number
): TradeAction {
  const target = (totalAmount * targetPct) / 100;
  const amount = roundToCents(Math.abs(target - currentBalance));

  if (currentBalance === 0) {
    return target > 0 ? { type: "buy", amount } : { type: "hold" };
  }

  const ratio = target / currentBalance;
  if (HOLD_RATIO_LOWER < ratio && ratio < HOLD_RATIO_UPPER && moneyToInvest === 0) {
    return { type: "hold" };
  }

  return ratio > 1.0 ? { type: "buy", amount } : { type: "sell", amount };
}

/**
 * Calculates the rebalancing strategy for a loaded portfolio.
 * Pure: the snapshot is not modified and a new result is returned on every call.
 *
 * @param snapshot - Loaded positions
 * @param moneyToInvest - New money going in (0 to just rebalance)
 * @param glidePath - Overrides the glide path selected from the snapshot label
 */
export function calculateStrategy(
  snapshot: PortfolioSnapshot,
  moneyToInvest: number,
  glidePath: GlidePath = selectGlidePath(snapshot.label)
): StrategyResult {
  const existingTotal = getTotalBalance(snapshot);
  const totalAmount = existingTotal + moneyToInvest;

  const funds: FundStrategy[] = FUND_ROLES.map((role) => {
    const position = snapshot.positions[role];
    const targetAllocationPct = getTargetPercent(glidePath, role);

    return {
      role,
      symbol: position.symbol,
      currentBalance: position.currentBalance,
      currentAllocationPct: percentOf(position.currentBalance, existingTotal),
      targetValue: roundToCents((totalAmount * targetAllocationPct) / 100),
      targetAllocationPct,
      action: decideTradeAction(
        targetAllocationPct,
        totalAmount,
        position.currentBalance,
        moneyToInvest
      ),
    };
  });

  return {
    label: snapshot.label,
    glidePath,
    moneyToInvest,
    totalAmount,
    funds,
  };
}

