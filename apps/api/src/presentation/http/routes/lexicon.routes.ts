import { Router } from "express";
import { container } from "../../../di/Container";
import { LexiconController } from "../controllers/LexiconController";

export function createLexiconRouter(): Router {
  const router = Router();
  const controller = container.resolve(LexiconController);

  // GET /api/lexicon/:strongsNumber - Definition for a Strong's number
  router.get("/:strongsNumber", (req, res, next) =>
    controller.getEntry(req, res, next),
  );

  return router;
}
