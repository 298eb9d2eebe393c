import { Router } from "express";
import type { Db } from "../../db/connection";
import { apiOk, getCtx } from "../../middleware/resolveContext";
import { getProfile, updateProfile } from "./service";

export function profileRouter(db: Db) {
  const r = Router();

  r.get("/", (req, res) => {
    res.json(apiOk(req, getProfile(db, getCtx(req).userId)));
  });

  r.put("/", (req, res) => {
    res.json(apiOk(req, updateProfile(db, getCtx(req), req.body)));
  });

  return r;
}
