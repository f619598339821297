import * as fs from "fs";
import * as path from "path";
import Papa from "papaparse";
import { FundPosition, PortfolioSnapshot, createSnapshot } from "../models/Portfolio";
import {
  CURRENT_VALUE_COLUMN,
  FIRST_POSITION_ROW,
  MIN_POSITION_RECORDS,
  SYMBOL_COLUMN,
} from "../utils/constants";
import { PositionFileError, errorMessage } from "../utils/errors";
import { parseDollarAmount } from "../utils/math";

/**
 * Parses CSV text into raw records. Empty lines are dropped.
 */
export function parseCsvRecords(csvText: string): string[][] {
  const parsed = Papa.parse<string[]>(csvText, {
    header: false,
    skipEmptyLines: true,
  });
  return parsed.data.filter((row) => row.length > 0);
}

function readPosition(records: string[][], rowIndex: number): FundPosition {
  const row = records[rowIndex];
  const symbol = row[SYMBOL_COLUMN]?.trim();
  const rawValue = row[CURRENT_VALUE_COLUMN];

  if (!symbol) {
    throw new PositionFileError(`Row ${rowIndex} has no symbol in column ${SYMBOL_COLUMN}`);
  }
  if (rawValue === undefined) {
    throw new PositionFileError(`Row ${rowIndex} has no value in column ${CURRENT_VALUE_COLUMN}`);
  }

  const currentBalance = parseDollarAmount(rawValue);
  if (currentBalance === null) {
    throw new PositionFileError(`Row ${rowIndex} has a non-numeric value "${rawValue}"`);
  }

  return { symbol, currentBalance };
}

/**
 * Builds a snapshot from a positions export. The first data row (the money
 * market fund) is skipped; the next three rows are the bond, international
 * and national funds.
 *
 * @param csvText - Contents of the export
 * @param label - Filename the export came from
 * @throws PositionFileError if the export has too few rows or unreadable values
 */
export function parsePositionsCsv(csvText: string, label: string): PortfolioSnapshot {
  const records = parseCsvRecords(csvText);
  if (records.length < MIN_POSITION_RECORDS) {
    throw new PositionFileError(
      `Expected at least ${MIN_POSITION_RECORDS} rows, found ${records.length}`
    );
  }

  return createSnapshot(label, {
    bond: readPosition(records, FIRST_POSITION_ROW),
    international: readPosition(records, FIRST_POSITION_ROW + 1),
    national: readPosition(records, FIRST_POSITION_ROW + 2),
  });
}

/**
 * Reads and parses a positions export from disk, labelled by its filename.
 *
 * @throws PositionFileError if the file cannot be read or parsed
 */
export function loadPositionsFile(filePath: string): PortfolioSnapshot {
  let csvText: string;
  try {
    csvText = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new PositionFileError(`Failed to read "${filePath}": ${errorMessage(err)}`);
  }
  return parsePositionsCsv(csvText, path.basename(filePath));
}
