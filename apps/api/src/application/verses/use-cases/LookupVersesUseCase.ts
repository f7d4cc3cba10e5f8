import { inject, injectable } from "tsyringe";
import { TYPES } from "../../../di/types";
import { TokenRecord } from "../../../domain/bible/entities/VerseData";
import { IBibleDataRepository } from "../../../domain/bible/repositories/IBibleDataRepository";
import { IStrongsNumberNormalizer } from "../../../domain/lexicon/services/IStrongsNumberNormalizer";
import { IRmacParser } from "../../../domain/morphology/services/IRmacParser";
import { IVerseReferenceNormalizer } from "../../../domain/references/services/IVerseReferenceNormalizer";
import { ILogger } from "../../../infrastructure/logging/ILogger";
import { IUseCase } from "../../shared/interfaces/IUseCase";
import { LookupVersesDto } from "../dto/LookupVersesDto";
import {
  TokenDto,
  VerseDto,
  VerseLookupResultDto,
} from "../dto/VerseLookupResultDto";

/**
 * Lookup Verses Use Case
 *
 * Normalizes each reference, fetches its tokens and enriches every
 * token with parsed morphology and its lexicon definition. Inputs that
 * do not normalize are reported as typed; references with no data are
 * reported in canonical form, after them.
 */
@injectable()
export class LookupVersesUseCase
  implements IUseCase<LookupVersesDto, VerseLookupResultDto>
{
  constructor(
    @inject(TYPES.BibleDataRepository)
    private bibleDataRepository: IBibleDataRepository,
    @inject(TYPES.VerseReferenceNormalizer)
    private referenceNormalizer: IVerseReferenceNormalizer,
    @inject(TYPES.StrongsNumberNormalizer)
    private strongsNormalizer: IStrongsNumberNormalizer,
    @inject(TYPES.RmacParser) private rmacParser: IRmacParser,
    @inject(TYPES.Logger) private logger: ILogger,
  ) {}

  async execute(dto: LookupVersesDto): Promise<VerseLookupResultDto> {
    this.logger.info("Starting verse lookup", {
      count: dto.verseReferences.length,
    });

    const normalized: string[] = [];
    const failedToNormalize: string[] = [];

    for (const reference of dto.verseReferences) {
      const canonical = this.referenceNormalizer.tryNormalize(reference);
      if (canonical === null) {
        this.logger.warn("Failed to normalize verse reference", { reference });
        failedToNormalize.push(reference);
      } else {
        normalized.push(canonical);
      }
    }

    const verses: VerseDto[] = [];
    const missing: string[] = [];

    for (const reference of normalized) {
      const verse = this.bibleDataRepository.findVerse(reference);
      if (!verse) {
        this.logger.warn("Verse not found", { reference });
        missing.push(reference);
        continue;
      }

      verses.push({
        reference,
        tokens: verse.tokens.map((token) => this.toTokenDto(token)),
      });
    }

    const notFound = [...failedToNormalize, ...missing];

    this.logger.info("Verse lookup complete", {
      found: verses.length,
      notFound: notFound.length,
    });

    return { verses, notFound };
  }

  private toTokenDto(token: TokenRecord): TokenDto {
    const strongsKey =
      this.strongsNormalizer.tryNormalize(token.strongs) ?? token.strongs;

    return {
      gloss: token.gloss,
      greek: token.greek,
      translit: token.translit,
      strongs: token.strongs,
      rmac: token.rmac,
      rmacDesc: token.rmac_desc ?? null,
      morph: this.rmacParser.parse(token.rmac),
      lexiconEntry: this.bibleDataRepository.findDefinition(strongsKey),
    };
  }
}
