import { z } from "zod";
import { InvestAmountError } from "./errors";

/**
 * Zod validation schemas for input data validation.
 */

const DECIMAL_PATTERN = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;

/**
 * Schema for the amount to invest as typed by the user.
 * Blank text means nothing new is invested; other text must be a decimal number.
 */
export const InvestAmountTextSchema = z
  .string()
  .transform((text) => text.trim())
  .refine((text) => text === "" || DECIMAL_PATTERN.test(text), {
    message: "Amount must be a decimal number",
  })
  .transform((text) => (text === "" ? 0 : Number(text)))
  .refine((amount) => Number.isFinite(amount), {
    message: "Amount must be finite",
  });

/**
 * Schema for the amount to invest in a request body: a number, text, or absent.
 */
export const InvestAmountSchema = z.union([z.number().finite(), z.string()]).optional();

/**
 * Schema for a positions export submitted as text.
 */
export const PositionsRequestSchema = z.object({
  csv: z.string(),
  filename: z.string().min(1),
});

/**
 * Schema for a strategy calculation request.
 * `glidePath` forces a glide path key instead of selecting one from the filename.
 */
export const StrategyRequestSchema = PositionsRequestSchema.extend({
  moneyToInvest: InvestAmountSchema,
  glidePath: z.string().optional(),
});

export type PositionsRequest = z.infer<typeof PositionsRequestSchema>;
export type StrategyRequest = z.infer<typeof StrategyRequestSchema>;

/**
 * Parses the amount to invest. Absent or blank input is 0.
 *
 * @throws InvestAmountError if the input is not a finite number
 */
export function parseInvestAmount(input: number | string | undefined): number {
  if (input === undefined) {
    return 0;
  }
  if (typeof input === "number") {
    if (!Number.isFinite(input)) {
      throw new InvestAmountError(String(input));
    }
    return input;
  }

  const result = InvestAmountTextSchema.safeParse(input);
  if (!result.success) {
    throw new InvestAmountError(input);
  }
  return result.data;
}
