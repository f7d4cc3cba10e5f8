import { Request, Response, NextFunction } from "express";
import { inject, injectable } from "tsyringe";
import { ParseMorphologyUseCase } from "../../../application/morphology/use-cases/ParseMorphologyUseCase";
import { TYPES } from "../../../di/types";
import { InvalidRmacCodeError } from "../../../shared/errors/DomainError";
import { BadRequestError } from "../../../shared/errors/HttpError";

@injectable()
export class MorphologyController {
  constructor(
    @inject(TYPES.ParseMorphologyUseCase)
    private parseMorphologyUseCase: ParseMorphologyUseCase,
  ) {}

  /**
   * GET /api/morphology/:code
   */
  async parse(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const result = await this.parseMorphologyUseCase.execute(req.params.code);

      res.status(200).json(result);
    } catch (error) {
      if (error instanceof InvalidRmacCodeError) {
        next(new BadRequestError(error.message, error.code));
      } else {
        next(error);
      }
    }
  }
}
