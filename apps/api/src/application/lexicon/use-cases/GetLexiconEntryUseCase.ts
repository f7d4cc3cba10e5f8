import { inject, injectable } from "tsyringe";
import { TYPES } from "../../../di/types";
import { IBibleDataRepository } from "../../../domain/bible/repositories/IBibleDataRepository";
import { IStrongsNumberNormalizer } from "../../../domain/lexicon/services/IStrongsNumberNormalizer";
import { ILogger } from "../../../infrastructure/logging/ILogger";
import { EntityNotFoundError } from "../../../shared/errors/DomainError";
import { IUseCase } from "../../shared/interfaces/IUseCase";
import { LexiconEntryDto } from "../dto/LexiconEntryDto";

/**
 * Get Lexicon Entry Use Case
 *
 * Looks up the definition for a Strong's number in any accepted spelling
 */
@injectable()
export class GetLexiconEntryUseCase implements IUseCase<string, LexiconEntryDto> {
  constructor(
    @inject(TYPES.BibleDataRepository)
    private bibleDataRepository: IBibleDataRepository,
    @inject(TYPES.StrongsNumberNormalizer)
    private strongsNormalizer: IStrongsNumberNormalizer,
    @inject(TYPES.Logger) private logger: ILogger,
  ) {}

  async execute(strongsNumber: string): Promise<LexiconEntryDto> {
    const normalized = this.strongsNormalizer.normalize(strongsNumber);

    const definition = this.bibleDataRepository.findDefinition(normalized);

    if (definition === null) {
      this.logger.warn("Lexicon entry not found", { strongsNumber: normalized });
      throw new EntityNotFoundError("Lexicon entry", normalized);
    }

    this.logger.debug("Lexicon entry found", { strongsNumber: normalized });

    return { strongsNumber: normalized, definition };
  }
}
