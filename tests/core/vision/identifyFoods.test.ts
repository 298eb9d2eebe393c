import { describe, it, expect, vi, beforeEach } from "vitest";
import type { FetchFn } from "../../../src/core/config";
import type { Db } from "../../../src/db/connection";
import { FOOD_LIST_PROMPT } from "../../../src/core/vision/gemini";
import { createImageAnalyzer, splitFoodList } from "../../../src/core/vision/identifyFoods";
import { createClock, createTestDb, jsonResponse, testConfig } from "../../helpers";

function geminiReply(text: string) {
  return { candidates: [{ content: { parts: [{ text }] } }] };
}

describe("splitFoodList", () => {
  it("trims items and drops blanks", () => {
    expect(splitFoodList(" eggs, toast , ,coffee,")).toEqual(["eggs", "toast", "coffee"]);
  });
});

describe("image analyzer", () => {
  let db: Db;
  let clock: ReturnType<typeof createClock>;
  const photo = Buffer.from("fake-jpeg-bytes-for-a-breakfast-plate");

  beforeEach(() => {
    db = createTestDb();
    clock = createClock();
  });

  function analyzerWith(fetch: FetchFn, geminiApiKey: string | null = "test-secret") {
    return createImageAnalyzer({ db, config: testConfig({ geminiApiKey }), fetch, now: clock.now });
  }

  it("sends the prompt and inline image to generateContent", async () => {
    const fetch = vi.fn<FetchFn>().mockImplementation(async () => jsonResponse(geminiReply("eggs")));
    await analyzerWith(fetch).identifyFoods(photo, "image/png");

    const [url, init] = fetch.mock.calls[0];
    expect(url).toBe("https://vision.test/v1beta/models/gemini-1.5-flash:generateContent?key=test-secret");
    expect(init?.method).toBe("POST");
    expect(JSON.parse(String(init?.body))).toEqual({
      contents: [
        {
          parts: [
            { text: FOOD_LIST_PROMPT },
            { inline_data: { mime_type: "image/png", data: photo.toString("base64") } },
          ],
        },
      ],
    });
  });

  it("splits the answer and serves the second call from cache", async () => {
    const fetch = vi.fn<FetchFn>().mockImplementation(async () => jsonResponse(geminiReply("eggs, toast , coffee")));
    const analyzer = analyzerWith(fetch);

    expect(await analyzer.identifyFoods(photo)).toEqual({
      status: "identified",
      foods: ["eggs", "toast", "coffee"],
      cached: false,
    });
    expect(await analyzer.identifyFoods(photo)).toEqual({
      status: "identified",
      foods: ["eggs", "toast", "coffee"],
      cached: true,
    });
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it("keys the cache on the leading part of the encoded image", async () => {
    const fetch = vi.fn<FetchFn>().mockImplementation(async () => jsonResponse(geminiReply("rice")));
    const analyzer = analyzerWith(fetch);

    // 75 bytes encode to exactly the 100 base64 characters used for the key.
    const prefix = Buffer.alloc(75, 7);
    await analyzer.identifyFoods(Buffer.concat([prefix, Buffer.from("first tail")]));
    const second = await analyzer.identifyFoods(Buffer.concat([prefix, Buffer.from("other tail")]));

    expect(second).toEqual({ status: "identified", foods: ["rice"], cached: true });
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it("calls the model again once the entry has expired", async () => {
    const fetch = vi.fn<FetchFn>().mockImplementation(async () => jsonResponse(geminiReply("salad")));
    const analyzer = analyzerWith(fetch);

    await analyzer.identifyFoods(photo);
    clock.advanceHours(167);
    await analyzer.identifyFoods(photo);
    expect(fetch).toHaveBeenCalledTimes(1);

    clock.advanceHours(2);
    await analyzer.identifyFoods(photo);
    expect(fetch).toHaveBeenCalledTimes(2);
  });

  it("reports an empty answer without caching it", async () => {
    const fetch = vi.fn<FetchFn>().mockImplementation(async () => jsonResponse(geminiReply(" , ")));
    const analyzer = analyzerWith(fetch);

    expect(await analyzer.identifyFoods(photo)).toEqual({ status: "empty" });
    expect(await analyzer.identifyFoods(photo)).toEqual({ status: "empty" });
    expect(fetch).toHaveBeenCalledTimes(2);
  });

  it("treats a reply without candidates as empty", async () => {
    const fetch = vi.fn<FetchFn>().mockImplementation(async () => jsonResponse({}));
    expect(await analyzerWith(fetch).identifyFoods(photo)).toEqual({ status: "empty" });
  });

  it("fails without calling out when no key is configured", async () => {
    const fetch = vi.fn<FetchFn>();
    expect(await analyzerWith(fetch, null).identifyFoods(photo)).toEqual({
      status: "failed",
      reason: "not_configured",
    });
    expect(fetch).not.toHaveBeenCalled();
  });

  it("still serves cached results when no key is configured", async () => {
    const seed = vi.fn<FetchFn>().mockImplementation(async () => jsonResponse(geminiReply("soup")));
    await analyzerWith(seed).identifyFoods(photo);

    const fetch = vi.fn<FetchFn>();
    expect(await analyzerWith(fetch, null).identifyFoods(photo)).toEqual({
      status: "identified",
      foods: ["soup"],
      cached: true,
    });
  });

  const failures: Array<{ label: string; impl: FetchFn; reason: "transport" | "bad_response" }> = [
    {
      label: "a rejected request",
      impl: async () => {
        throw new Error("ECONNREFUSED");
      },
      reason: "transport",
    },
    { label: "a 503 status", impl: async () => new Response("unavailable", { status: 503 }), reason: "transport" },
    { label: "a non-JSON body", impl: async () => new Response("not json", { status: 200 }), reason: "bad_response" },
    { label: "an unexpected shape", impl: async () => jsonResponse({ candidates: "nope" }), reason: "bad_response" },
  ];

  it.each(failures)("reports $label as an uncached failure", async ({ impl, reason }) => {
    const fetch = vi.fn<FetchFn>().mockImplementation(impl);
    const analyzer = analyzerWith(fetch);

    expect(await analyzer.identifyFoods(photo)).toEqual({ status: "failed", reason });
    await analyzer.identifyFoods(photo);
    expect(fetch).toHaveBeenCalledTimes(2);
  });
});
