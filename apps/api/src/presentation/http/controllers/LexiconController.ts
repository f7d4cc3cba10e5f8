import { Request, Response, NextFunction } from "express";
import { inject, injectable } from "tsyringe";
import { GetLexiconEntryUseCase } from "../../../application/lexicon/use-cases/GetLexiconEntryUseCase";
import { TYPES } from "../../../di/types";
import {
  EntityNotFoundError,
  InvalidStrongsNumberError,
} from "../../../shared/errors/DomainError";
import {
  BadRequestError,
  NotFoundError,
} from "../../../shared/errors/HttpError";

/**
 * Lexicon HTTP Controller
 */
@injectable()
export class LexiconController {
  constructor(
    @inject(TYPES.GetLexiconEntryUseCase)
    private getLexiconEntryUseCase: GetLexiconEntryUseCase,
  ) {}

  /**
   * GET /api/lexicon/:strongsNumber
   */
  async getEntry(
    req: Request,
    res: Response,
    next: NextFunction,
  ): Promise<void> {
    try {
      const { strongsNumber } = req.params;

      const entry = await this.getLexiconEntryUseCase.execute(strongsNumber);

      res.status(200).json(entry);
    } catch (error) {
      if (error instanceof InvalidStrongsNumberError) {
        next(new BadRequestError(error.message, error.code));
      } else if (error instanceof EntityNotFoundError) {
        next(new NotFoundError(error.message));
      } else {
        next(error);
      }
    }
  }
}
