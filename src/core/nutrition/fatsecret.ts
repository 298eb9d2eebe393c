import { z } from "zod";
import type { FetchFn } from "../config";
import type { Per100g } from "./types";

const FoodSchema = z
  .object({
    food_name: z.string().optional(),
    food_description: z.string().optional(),
  })
  .passthrough();

/** `foods.search` body. A single hit comes back as an object, several as a list. */
export const FoodsSearchResponseSchema = z
  .object({
    foods: z
      .object({
        food: z.union([FoodSchema, z.array(FoodSchema)]).optional(),
      })
      .passthrough()
      .optional(),
    error: z.unknown().optional(),
  })
  .passthrough();

export type FoodsSearchResponse = z.infer<typeof FoodsSearchResponseSchema>;

export type LookupResult =
  | { ok: true; body: FoodsSearchResponse }
  | { ok: false; reason: "transport" | "bad_response" | "api_error"; detail: string };

export async function searchFoods(args: {
  fetch: FetchFn;
  baseUrl: string;
  accessToken: string;
  foodName: string;
}): Promise<LookupResult> {
  const url = new URL(args.baseUrl);
  url.searchParams.set("method", "foods.search");
  url.searchParams.set("search_expression", args.foodName);
  url.searchParams.set("format", "json");

  let resp: Response;
  try {
    resp = await args.fetch(url.toString(), {
      method: "GET",
      headers: { Authorization: `Bearer ${args.accessToken}` },
    });
  } catch (e) {
    return { ok: false, reason: "transport", detail: e instanceof Error ? e.message : String(e) };
  }

  if (!resp.ok) {
    const txt = await resp.text().catch(() => "");
    return { ok: false, reason: "transport", detail: `${resp.status}:${txt.slice(0, 250)}` };
  }

  let json: unknown;
  try {
    json = await resp.json();
  } catch {
    return { ok: false, reason: "bad_response", detail: "non-JSON body" };
  }

  const parsed = FoodsSearchResponseSchema.safeParse(json);
  if (!parsed.success) {
    return { ok: false, reason: "bad_response", detail: parsed.error.message.slice(0, 250) };
  }
  if (parsed.data.error !== undefined) {
    return { ok: false, reason: "api_error", detail: JSON.stringify(parsed.data.error).slice(0, 250) };
  }

  return { ok: true, body: parsed.data };
}

/** Description of the first hit, or null when the search found nothing usable. */
export function firstDescription(body: FoodsSearchResponse): string | null {
  const food = body.foods?.food;
  const first = Array.isArray(food) ? food[0] : food;
  const desc = first?.food_description?.trim();
  return desc ? desc : null;
}

function readNumber(part: string): number {
  const afterColon = part.slice(part.indexOf(":") + 1);
  const m = /-?\d+(?:\.\d+)?/.exec(afterColon);
  if (!m) return 0;
  const n = Number(m[0]);
  return Number.isFinite(n) && n >= 0 ? n : 0;
}

/**
 * Parses "Per 100g - Calories: 165kcal | Fat: 3.57g | Carbs: 0.00g | Protein: 31.02g".
 *
 * Fields that cannot be read stay 0; all four 0 is a parse failure (null).
 * A "Per Ng" header is normalised to 100 g, any other header is taken as per 100 g.
 */
export function parseFoodDescription(description: string): Per100g | null {
  const out: Per100g = { caloriesPer100g: 0, proteinPer100g: 0, fatPer100g: 0, carbsPer100g: 0 };

  for (const raw of description.split("|")) {
    const part = raw.trim();
    if (part.includes("Calories:")) out.caloriesPer100g = readNumber(part);
    else if (part.includes("Fat:")) out.fatPer100g = readNumber(part);
    else if (part.includes("Carbs:")) out.carbsPer100g = readNumber(part);
    else if (part.includes("Protein:")) out.proteinPer100g = readNumber(part);
  }

  if (
    out.caloriesPer100g === 0 &&
    out.proteinPer100g === 0 &&
    out.fatPer100g === 0 &&
    out.carbsPer100g === 0
  ) {
    return null;
  }

  const grams = /^\s*Per\s+(\d+(?:\.\d+)?)\s*g\b/i.exec(description);
  const basis = grams ? Number(grams[1]) : 100;
  if (!(basis > 0) || basis === 100) return out;

  const f = 100 / basis;
  return {
    caloriesPer100g: out.caloriesPer100g * f,
    proteinPer100g: out.proteinPer100g * f,
    fatPer100g: out.fatPer100g * f,
    carbsPer100g: out.carbsPer100g * f,
  };
}
