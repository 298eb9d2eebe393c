import { Router } from "express";
import type { Db } from "../../db/connection";
import { apiOk, getCtx } from "../../middleware/resolveContext";
import { addVitals, listVitals } from "./service";

export function vitalsRouter(db: Db) {
  const r = Router();

  // GET /v1/vitals?from=YYYY-MM-DD&to=YYYY-MM-DD
  r.get("/", (req, res) => {
    res.json(apiOk(req, listVitals(db, getCtx(req).userId, req.query)));
  });

  r.post("/", (req, res) => {
    res.status(201).json(apiOk(req, addVitals(db, getCtx(req), req.body)));
  });

  return r;
}
