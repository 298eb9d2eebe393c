import { z } from "zod";
import type { FetchFn } from "../config";

export const FOOD_LIST_PROMPT =
  "List only the food items in this image, separated by commas. Be concise. Example: eggs, toast, coffee";

const GenerateContentSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z.array(z.object({ text: z.string().optional() }).passthrough()).optional(),
          })
          .passthrough()
          .optional(),
      }).passthrough()
    )
    .optional(),
});

export type VisionCallResult =
  | { ok: true; text: string }
  | { ok: false; reason: "transport" | "bad_response"; detail: string };

/**
 * One generateContent call with a text prompt and an inline image.
 * `text` is "" when the model answered without any usable text.
 */
export async function generateFromImage(args: {
  fetch: FetchFn;
  baseUrl: string;
  model: string;
  apiKey: string;
  prompt: string;
  mimeType: string;
  imageBase64: string;
}): Promise<VisionCallResult> {
  const url = `${args.baseUrl}/models/${encodeURIComponent(args.model)}:generateContent?key=${encodeURIComponent(args.apiKey)}`;

  let resp: Response;
  try {
    resp = await args.fetch(url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        contents: [
          {
            parts: [
              { text: args.prompt },
              { inline_data: { mime_type: args.mimeType, data: args.imageBase64 } },
            ],
          },
        ],
      }),
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

  const parsed = GenerateContentSchema.safeParse(json);
  if (!parsed.success) {
    return { ok: false, reason: "bad_response", detail: parsed.error.message.slice(0, 250) };
  }

  const text = parsed.data.candidates?.[0]?.content?.parts?.[0]?.text ?? "";
  return { ok: true, text };
}
