import { GlidePath } from "./GlidePath";
import { FundRole } from "./Portfolio";

/**
 * Strategy result data structures
 */

export interface HoldAction {
  type: "hold";
}

export interface BuyAction {
  type: "buy";
  amount: number; // dollars, rounded to cents
}

export interface SellAction {
  type: "sell";
  amount: number; // dollars, rounded to cents
}

export type TradeAction = HoldAction | BuyAction | SellAction;

export interface FundStrategy {
  role: FundRole;
  symbol: string;
  currentBalance: number;
  currentAllocationPct: number; // share of existing balances, 0-100
  targetValue: number;
  targetAllocationPct: number; // 0-100
  action: TradeAction;
}

export interface StrategyResult {
  label: string;
  glidePath: GlidePath;
  moneyToInvest: number;
  totalAmount: number; // existing balances plus new money
  funds: FundStrategy[];
}
