import { loadPositionsFile } from "../engine/positionLoader";
import { calculateStrategy } from "../engine/rebalancer";
import { Recommendation, buildRecommendations, formatInfoTable } from "../engine/report";
import { FundRole, PortfolioSnapshot } from "../models/Portfolio";
import { StrategyResult } from "../models/StrategyResult";
import { MESSAGES } from "../utils/constants";
import { InvestAmountError, PositionFileError } from "../utils/errors";
import { parseInvestAmount } from "../utils/validation";

export interface CalculationOutcome {
  status: string;
  result: StrategyResult;
  recommendations: Recommendation[];
  table: string;
}

/**
 * One user's interaction with the allocation form: load an export, enter an
 * amount, calculate, copy amounts. Errors are recovered here and turned into
 * the status line; nothing else is thrown for bad user input.
 */
export class AllocationSession {
  private snapshot: PortfolioSnapshot | null = null;
  private lastOutcome: CalculationOutcome | null = null;
  private status = "";

  getSnapshot(): PortfolioSnapshot | null {
    return this.snapshot;
  }

  getStatus(): string {
    return this.status;
  }

  getLastOutcome(): CalculationOutcome | null {
    return this.lastOutcome;
  }

  /**
   * Loads a positions export, replacing whatever was loaded before. On
   * failure the session is left with no data loaded.
   *
   * @returns true if the file loaded
   */
  loadFile(filePath: string): boolean {
    try {
      this.snapshot = loadPositionsFile(filePath);
      this.status = this.snapshot.label;
      return true;
    } catch (error) {
      if (!(error instanceof PositionFileError)) {
        throw error;
      }
      console.error(`Error loading positions: ${error.message}`);
      this.snapshot = null;
      this.status = error.userMessage;
      return false;
    }
  }

  /**
   * Calculates the strategy for the loaded export. An invalid amount aborts
   * the calculation and keeps the previous outcome.
   */
  calculate(amountText: string): CalculationOutcome | null {
    let moneyToInvest: number;
    try {
      moneyToInvest = parseInvestAmount(amountText);
    } catch (error) {
      if (!(error instanceof InvestAmountError)) {
        throw error;
      }
      this.status = error.userMessage;
      return null;
    }

    if (this.snapshot === null) {
      this.status = MESSAGES.csvFileError;
      return null;
    }

    const result = calculateStrategy(this.snapshot, moneyToInvest);
    this.status = MESSAGES.strategyCalculated;
    this.lastOutcome = {
      status: this.status,
      result,
      recommendations: buildRecommendations(result),
      table: formatInfoTable(result),
    };
    return this.lastOutcome;
  }

  /**
   * Amount to paste for a fund from the last calculation, "" if none.
   */
  copyAmount(role: FundRole): string {
    const recommendation = this.lastOutcome?.recommendations.find((r) => r.role === role);
    return recommendation?.copyAmount ?? "";
  }
}
