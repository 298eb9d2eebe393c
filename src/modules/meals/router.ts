import { Router } from "express";
import multer from "multer";
import { apiOk, getCtx } from "../../middleware/resolveContext";
import { asyncHandler } from "../../middleware/asyncHandler";
import { dayOrToday } from "../../utils/validation";
import { addManualMeal, addPhotoMeal, listMeals, type MealsDeps } from "./service";

export function mealsRouter(deps: MealsDeps, opts: { uploadMaxBytes: number }) {
  const r = Router();

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: opts.uploadMaxBytes, files: 1 },
  });

  // GET /v1/meals?date=YYYY-MM-DD
  r.get("/", (req, res) => {
    const date = dayOrToday(deps.now).parse(req.query.date);
    res.json(apiOk(req, { date, meals: listMeals(deps.db, getCtx(req).userId, date) }));
  });

  // Manual entry
  r.post("/", (req, res) => {
    const meal = addManualMeal(deps, getCtx(req), req.body);
    res.status(201).json(apiOk(req, meal));
  });

  // Photo entry: multipart "photo" + date, mealType, portionGrams
  r.post(
    "/photo",
    upload.single("photo"),
    asyncHandler(async (req, res) => {
      const out = await addPhotoMeal(deps, getCtx(req), req.body, req.file);
      res.status(201).json(apiOk(req, out));
    })
  );

  return r;
}
