import express from "express";
import type { Db } from "./db/connection";
import type { Core } from "./core";
import type { Clock } from "./core/config";
import { requestId } from "./middleware/requestId";
import { requireAuth } from "./middleware/auth/requireAuth";
import { resolveContext } from "./middleware/resolveContext";
import { errorHandler } from "./middleware/errorHandler";
import { profileRouter } from "./modules/profile/router";
import { vitalsRouter } from "./modules/vitals/router";
import { mealsRouter } from "./modules/meals/router";
import { activitiesRouter } from "./modules/activities/router";
import { summaryRouter } from "./modules/summary/router";

export type AppDeps = {
  db: Db;
  core: Core;
  defaultTargetCalories: number;
  uploadMaxBytes: number;
  now?: Clock;
};

export function createApp(deps: AppDeps) {
  const { db, core } = deps;
  const app = express();

  app.use(express.json({ limit: "1mb" }));
  app.use(express.urlencoded({ extended: false }));

  app.get("/health", (_req, res) => res.json({ ok: true }));

  // Correlation + auth + context
  app.use(requestId());
  app.use(requireAuth());
  app.use(resolveContext({ db, defaultTargetCalories: deps.defaultTargetCalories }));

  app.use("/v1/profile", profileRouter(db));
  app.use("/v1/vitals", vitalsRouter(db));
  app.use("/v1/meals", mealsRouter({ db, core, now: deps.now }, { uploadMaxBytes: deps.uploadMaxBytes }));
  app.use("/v1/activities", activitiesRouter({ db, summary: core.summary, now: deps.now }));
  app.use(
    "/v1/summary",
    summaryRouter({ db, summary: core.summary, defaultTargetCalories: deps.defaultTargetCalories })
  );

  // JSON for unknown routes, never the HTML default
  app.use((_req, res) => {
    res.status(404).json({ error: "ROUTE_NOT_FOUND" });
  });

  app.use(errorHandler());

  return app;
}
