import { Router } from "express";
import { container } from "../../../di/Container";
import { MorphologyController } from "../controllers/MorphologyController";

export function createMorphologyRouter(): Router {
  const router = Router();
  const controller = container.resolve(MorphologyController);

  // GET /api/morphology/:code - Decode an RMAC code
  router.get("/:code", (req, res, next) => controller.parse(req, res, next));

  return router;
}
