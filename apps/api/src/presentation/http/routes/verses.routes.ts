import { Router } from "express";
import { container } from "../../../di/Container";
import { VersesController } from "../controllers/VersesController";

export function createVersesRouter(): Router {
  const router = Router();
  const controller = container.resolve(VersesController);

  // GET /api/verses/_health - Dataset status
  router.get("/_health", (req, res, next) => controller.health(req, res, next));

  // GET /api/verses/lookup - References in the query string
  router.get("/lookup", (req, res, next) =>
    controller.lookupFromQuery(req, res, next),
  );

  // POST /api/verses/lookup - References in the JSON body
  router.post("/lookup", (req, res, next) =>
    controller.lookupFromBody(req, res, next),
  );

  return router;
}
