import { inject, injectable } from "tsyringe";
import { TYPES } from "../../../di/types";
import { IRmacParser } from "../../../domain/morphology/services/IRmacParser";
import { InvalidRmacCodeError } from "../../../shared/errors/DomainError";
import { IUseCase } from "../../shared/interfaces/IUseCase";
import { MorphologyDto } from "../dto/MorphologyDto";

@injectable()
export class ParseMorphologyUseCase implements IUseCase<string, MorphologyDto> {
  constructor(@inject(TYPES.RmacParser) private rmacParser: IRmacParser) {}

  async execute(code: string): Promise<MorphologyDto> {
    const morph = this.rmacParser.parse(code);

    if (morph === null) {
      throw new InvalidRmacCodeError(code);
    }

    return { code: code.trim().toUpperCase(), morph };
  }
}
