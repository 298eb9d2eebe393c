import { z } from "zod";
import { systemClock, type Clock } from "../core/config";
import { isIsoDay, isoLocalDay } from "./dates";
import { normalizeMealType } from "./mealTime";

export const IsoDaySchema = z
  .string()
  .trim()
  .refine(isIsoDay, { message: "Expected a YYYY-MM-DD calendar date" });

/** Optional day that defaults to the local calendar day of `now`. */
export function dayOrToday(now: Clock = systemClock) {
  return IsoDaySchema.optional().transform((v) => v ?? isoLocalDay(now()));
}

export const MealTypeSchema = z
  .string()
  .transform((v, ctx) => {
    const t = normalizeMealType(v);
    if (!t) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Unknown meal type" });
      return z.NEVER;
    }
    return t;
  });

/** Form fields arrive as strings; blank means "not provided". */
export function blankToUndefined(v: unknown) {
  return typeof v === "string" && v.trim() === "" ? undefined : v;
}

/** Number from JSON or a form field, bounded, with a default for blank/missing. */
export function boundedNumber(min: number, max: number, fallback: number) {
  return z.preprocess(blankToUndefined, z.coerce.number().min(min).max(max).default(fallback));
}

/** Optional bounded number; blank/missing stays null. */
export function optionalNumber(min: number, max: number) {
  return z.preprocess(blankToUndefined, z.coerce.number().min(min).max(max).nullable().default(null));
}
