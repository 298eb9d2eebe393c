import { afterEach, describe, it, expect, vi } from "vitest";
import { mealTypeForTime, normalizeMealType } from "../../src/utils/mealTime";

const at = (hour: number) => new Date(2024, 0, 1, hour, 15);

describe("mealTypeForTime", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("uses the default windows", () => {
    expect(mealTypeForTime(at(7))).toBe("breakfast");
    expect(mealTypeForTime(at(12))).toBe("lunch");
    expect(mealTypeForTime(at(16))).toBe("snacks");
    expect(mealTypeForTime(at(19))).toBe("dinner");
    expect(mealTypeForTime(at(2))).toBe("snacks");
  });

  it("honours configured windows and ignores malformed ones", () => {
    vi.stubEnv("MEAL_MIDDAY", "12-16");
    vi.stubEnv("MEAL_EVENING", "late");

    expect(mealTypeForTime(at(16))).toBe("lunch");
    expect(mealTypeForTime(at(19))).toBe("dinner");
  });
});

describe("normalizeMealType", () => {
  it("maps aliases onto the four meal types", () => {
    expect(normalizeMealType(" Breakfast ")).toBe("breakfast");
    expect(normalizeMealType("snack")).toBe("snacks");
    expect(normalizeMealType("off-hours")).toBe("snacks");
    expect(normalizeMealType("morning")).toBe("breakfast");
    expect(normalizeMealType("midday")).toBe("lunch");
    expect(normalizeMealType("evening")).toBe("dinner");
  });

  it("rejects anything else", () => {
    expect(normalizeMealType("brunch")).toBeNull();
    expect(normalizeMealType(3)).toBeNull();
  });
});
