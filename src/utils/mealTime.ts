export type MealType = "breakfast" | "lunch" | "snacks" | "dinner";

function parseHourRange(envVal: string | undefined, fallback: [number, number]): [number, number] {
  if (!envVal) return fallback;
  const m = envVal.trim().match(/^(\d{1,2})\s*-\s*(\d{1,2})$/);
  if (!m) return fallback;
  const a = Number(m[1]);
  const b = Number(m[2]);
  if (a < 0 || a > 23 || b < 0 || b > 23) return fallback;
  return [a, b];
}

function inRangeInclusive(hour: number, [start, end]: [number, number]) {
  return hour >= start && hour <= end;
}

/**
 * Default meal type for entries that do not name one, from the local hour.
 * Windows are configurable via MEAL_MORNING=5-10, MEAL_MIDDAY=11-14, MEAL_EVENING=18-23.
 */
export function mealTypeForTime(date: Date = new Date()): MealType {
  const hour = date.getHours();

  const morning = parseHourRange(process.env.MEAL_MORNING, [5, 10]);
  const midday = parseHourRange(process.env.MEAL_MIDDAY, [11, 14]);
  const evening = parseHourRange(process.env.MEAL_EVENING, [18, 23]);

  if (inRangeInclusive(hour, morning)) return "breakfast";
  if (inRangeInclusive(hour, midday)) return "lunch";
  if (inRangeInclusive(hour, evening)) return "dinner";
  return "snacks";
}

/** Accepts canonical names plus "snack" and the time-window labels. */
export function normalizeMealType(raw: unknown): MealType | null {
  if (typeof raw !== "string") return null;
  const v = raw.trim().toLowerCase();

  if (v === "breakfast" || v === "lunch" || v === "snacks" || v === "dinner") return v;
  if (v === "snack" || v === "off-hours") return "snacks";
  if (v === "morning") return "breakfast";
  if (v === "midday") return "lunch";
  if (v === "evening") return "dinner";

  return null;
}
