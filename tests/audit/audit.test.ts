import { describe, it, expect } from "vitest";
import { redactMetadata, writeAuditEvent } from "../../src/audit/audit";
import { createTestDb, testCtx } from "../helpers";

describe("redactMetadata", () => {
  it("masks image payloads and credentials and keeps everything else", () => {
    expect(
      redactMetadata({
        imageData: "aGVsbG8=",
        imageBase64: "aGVsbG8=",
        apiKey: "test-secret",
        authorization: "Bearer test-secret",
        token: "test-secret",
        prompt: "list the foods",
        date: "2024-03-10",
      })
    ).toEqual({
      imageData: "[REDACTED]",
      imageBase64: "[REDACTED]",
      apiKey: "[REDACTED]",
      authorization: "[REDACTED]",
      token: "[REDACTED]",
      prompt: "list the foods",
      date: "2024-03-10",
    });
  });
});

describe("writeAuditEvent", () => {
  it("stores the caller, action and redacted metadata", () => {
    const db = createTestDb();
    const ctx = testCtx(db);

    const id = writeAuditEvent(db, ctx, {
      action: "MEAL_CREATE",
      targetType: "meal",
      targetId: "m1",
      metadata: { imageData: "aGVsbG8=", calories: 420 },
    });

    expect(db.prepare("SELECT * FROM audit_events WHERE auditEventId = ?").get(id)).toMatchObject({
      actorUserId: "1",
      action: "MEAL_CREATE",
      targetType: "meal",
      targetId: "m1",
      requestId: "req-test",
      ip: "127.0.0.1",
      userAgent: "vitest",
      metadataJson: '{"imageData":"[REDACTED]","calories":420}',
    });
  });
});
