import { randomUUID } from "crypto";
import type { Db } from "../db/connection";
import type { AppContext } from "../middleware/resolveContext";

export type AuditAction =
  | "MEAL_CREATE"
  | "ACTIVITY_CREATE"
  | "ACTIVITY_DELETE"
  | "VITALS_CREATE"
  | "PROFILE_UPDATE"
  | "SUMMARY_RECONCILE";

export type AuditEvent = {
  action: AuditAction;
  targetType?: string | null;
  targetId?: string | null;
  metadata?: Record<string, unknown>;
};

// Never persist raw images or credentials in the audit trail.
const REDACT_KEYS = new Set([
  "imageBase64",
  "imageData",
  "apiKey",
  "authorization",
  "token",
]);

export function redactMetadata(input: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(input)) {
    out[k] = REDACT_KEYS.has(k) ? "[REDACTED]" : v;
  }
  return out;
}

export function writeAuditEvent(db: Db, ctx: AppContext, evt: AuditEvent) {
  const auditEventId = randomUUID();

  db.prepare(`
    INSERT INTO audit_events (
      auditEventId,
      actorUserId,
      action,
      targetType,
      targetId,
      requestId,
      ip,
      userAgent,
      metadataJson
    )
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
  `).run(
    auditEventId,
    ctx.userId,
    evt.action,
    evt.targetType ?? null,
    evt.targetId ?? null,
    ctx.requestId,
    ctx.ip,
    ctx.userAgent,
    evt.metadata ? JSON.stringify(redactMetadata(evt.metadata)) : null
  );

  return auditEventId;
}
