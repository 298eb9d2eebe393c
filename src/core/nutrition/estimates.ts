import { z } from "zod";
import rawEstimates from "./estimates.json";
import { Per100gSchema, type Per100g } from "./types";

const EstimateSchema = Per100gSchema.extend({
  name: z.string().min(1).transform((s) => s.toLowerCase()),
});

export type Estimate = z.infer<typeof EstimateSchema>;

/** Built-in per-100g table, in file order. Order is the tie-break for matching. */
export const ESTIMATES: readonly Estimate[] = z.array(EstimateSchema).parse(rawEstimates);

export function normalizeFoodName(name: string): string {
  return name.trim().toLowerCase().replace(/\.+$/, "").trim();
}

/**
 * Case-insensitive substring match in either direction; first entry wins.
 * "grilled chicken breast" -> chicken, "broc" -> broccoli.
 */
export function matchEstimate(
  foodName: string,
  table: readonly Estimate[] = ESTIMATES
): { key: string; per100g: Per100g } | null {
  const q = normalizeFoodName(foodName);
  if (!q) return null;

  for (const e of table) {
    if (q.includes(e.name) || e.name.includes(q)) {
      const { name, ...per100g } = e;
      return { key: name, per100g };
    }
  }
  return null;
}
