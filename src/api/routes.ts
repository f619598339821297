import { Router, Request, Response } from "express";
import { getAllGlidePaths, getGlidePath, selectGlidePath } from "../engine/glidePath";
import { parsePositionsCsv } from "../engine/positionLoader";
import { calculateStrategy } from "../engine/rebalancer";
import { buildInfoTable, buildRecommendations, formatInfoTable } from "../engine/report";
import { MESSAGES } from "../utils/constants";
import { errorMessage, isAllocationError } from "../utils/errors";
import {
  PositionsRequestSchema,
  StrategyRequestSchema,
  parseInvestAmount,
} from "../utils/validation";

const router = Router();

function sendAllocationError(res: Response, error: unknown, context: string): Response {
  if (isAllocationError(error)) {
    return res.status(400).json({
      error: error.userMessage,
      message: error.message,
    });
  }
  console.error(`Error in ${context}:`, error);
  return res.status(500).json({
    error: "Internal server error",
    message: errorMessage(error),
  });
}

/**
 * GET /api/glide-paths
 * List the target-date glide paths, in matching order, followed by the default
 */
router.get("/glide-paths", (req: Request, res: Response) => {
  res.json({ glidePaths: getAllGlidePaths() });
});

/**
 * POST /api/positions
 * Parse a positions export and return the tracked fund balances
 */
router.post("/positions", (req: Request, res: Response) => {
  const parsed = PositionsRequestSchema.safeParse(req.body);
  if (!parsed.success) {
    return res.status(400).json({
      error: "Missing required fields: csv, filename",
      issues: parsed.error.issues,
    });
  }

  try {
    const snapshot = parsePositionsCsv(parsed.data.csv, parsed.data.filename);
    res.json({
      snapshot,
      glidePath: selectGlidePath(snapshot.label),
    });
  } catch (error) {
    sendAllocationError(res, error, "positions parsing");
  }
});

/**
 * GET /api/strategy
 * Get information about the strategy endpoint
 */
router.get("/strategy", (req: Request, res: Response) => {
  res.json({
    method: "POST",
    description: "Calculate buy/sell/hold amounts to reach the glide-path allocation",
    endpoint: "/api/strategy",
    requiredFields: [
      "csv",
      "filename",
      "moneyToInvest (optional, number or text, blank = 0)",
      "glidePath (optional, overrides the filename token)",
    ],
    note: "The filename selects the glide path when it contains a target-date token such as 2040.",
  });
});

/**
 * POST /api/strategy
 * Calculate the rebalancing strategy for a positions export
 */
router.post("/strategy", (req: Request, res: Response) => {
  const parsed = StrategyRequestSchema.safeParse(req.body);
  if (!parsed.success) {
    return res.status(400).json({
      error: "Missing required fields: csv, filename",
      issues: parsed.error.issues,
    });
  }

  const { csv, filename, moneyToInvest, glidePath: glidePathKey } = parsed.data;

  try {
    const amount = parseInvestAmount(moneyToInvest);
    const snapshot = parsePositionsCsv(csv, filename);

    let glidePath = selectGlidePath(snapshot.label);
    if (glidePathKey !== undefined) {
      const requested = getGlidePath(glidePathKey);
      if (!requested) {
        return res.status(400).json({ error: `Unknown glide path: ${glidePathKey}` });
      }
      glidePath = requested;
    }

    const result = calculateStrategy(snapshot, amount, glidePath);
    res.json({
      status: MESSAGES.strategyCalculated,
      result,
      recommendations: buildRecommendations(result),
      infoTable: buildInfoTable(result),
      table: formatInfoTable(result),
    });
  } catch (error) {
    sendAllocationError(res, error, "strategy calculation");
  }
});

/**
 * GET /api
 * API information endpoint
 */
router.get("/", (req: Request, res: Response) => {
  res.json({
    message: "Asset Allocation Rebalancing API",
    version: "1.0.0",
    endpoints: {
      glidePaths: "GET /api/glide-paths - List target-date glide paths",
      positions: "POST /api/positions - Parse a positions export",
      strategy: "POST /api/strategy - Calculate buy/sell/hold amounts",
      health: "GET /api/health - Health check",
    },
  });
});

/**
 * GET /api/health
 * Health check endpoint
 */
router.get("/health", (req: Request, res: Response) => {
  res.json({ status: "ok", timestamp: new Date().toISOString() });
});

export default router;
