import { Request, Response, NextFunction } from "express";
import { inject, injectable } from "tsyringe";
import { LookupVersesUseCase } from "../../../application/verses/use-cases/LookupVersesUseCase";
import { GetDatasetStatusUseCase } from "../../../application/verses/use-cases/GetDatasetStatusUseCase";
import { LookupVersesDto } from "../../../application/verses/dto/LookupVersesDto";
import { TYPES } from "../../../di/types";
import { ValidationError } from "../../../shared/errors/DomainError";
import { BadRequestError } from "../../../shared/errors/HttpError";

/**
 * Verses HTTP Controller
 */
@injectable()
export class VersesController {
  constructor(
    @inject(TYPES.LookupVersesUseCase)
    private lookupVersesUseCase: LookupVersesUseCase,
    @inject(TYPES.GetDatasetStatusUseCase)
    private getDatasetStatusUseCase: GetDatasetStatusUseCase,
  ) {}

  /**
   * GET /api/verses/lookup?verseReferences=...
   */
  async lookupFromQuery(
    req: Request,
    res: Response,
    next: NextFunction,
  ): Promise<void> {
    try {
      const dto = LookupVersesDto.fromQuery(req.query);

      res.status(200).json(await this.lookupVersesUseCase.execute(dto));
    } catch (error) {
      this.forward(error, next);
    }
  }

  /**
   * POST /api/verses/lookup
   */
  async lookupFromBody(
    req: Request,
    res: Response,
    next: NextFunction,
  ): Promise<void> {
    try {
      const dto = LookupVersesDto.fromBody(req.body);

      res.status(200).json(await this.lookupVersesUseCase.execute(dto));
    } catch (error) {
      this.forward(error, next);
    }
  }

  /**
   * GET /api/verses/_health
   */
  async health(_req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      res.status(200).json(await this.getDatasetStatusUseCase.execute());
    } catch (error) {
      next(error);
    }
  }

  private forward(error: unknown, next: NextFunction): void {
    if (error instanceof ValidationError) {
      next(new BadRequestError(error.message, error.code));
    } else {
      next(error);
    }
  }
}
