import { Router } from "express";
import { apiOk, getCtx } from "../../middleware/resolveContext";
import { dayOrToday } from "../../utils/validation";
import { addActivity, deleteActivity, listActivities, type ActivitiesDeps } from "./service";

export function activitiesRouter(deps: ActivitiesDeps) {
  const r = Router();

  r.get("/", (req, res) => {
    const date = dayOrToday(deps.now).parse(req.query.date);
    res.json(apiOk(req, { date, activities: listActivities(deps.db, getCtx(req).userId, date) }));
  });

  r.post("/", (req, res) => {
    res.status(201).json(apiOk(req, addActivity(deps, getCtx(req), req.body)));
  });

  r.delete("/:activityId", (req, res) => {
    res.json(apiOk(req, deleteActivity(deps, getCtx(req), req.params.activityId)));
  });

  return r;
}
