import { inject, injectable } from "tsyringe";
import { TYPES } from "../../../di/types";
import { IBibleDataRepository } from "../../../domain/bible/repositories/IBibleDataRepository";
import { IUseCase } from "../../shared/interfaces/IUseCase";
import { DatasetStatusDto } from "../dto/DatasetStatusDto";

/**
 * Reports whether the datasets loaded and how many records each holds.
 * The service itself is healthy whenever it can answer.
 */
@injectable()
export class GetDatasetStatusUseCase implements IUseCase<void, DatasetStatusDto> {
  constructor(
    @inject(TYPES.BibleDataRepository)
    private bibleDataRepository: IBibleDataRepository,
  ) {}

  async execute(): Promise<DatasetStatusDto> {
    const { initialized, versesCount, lexiconCount } =
      this.bibleDataRepository.getStatus();

    return {
      status: "Healthy",
      initialized,
      versesCount,
      lexiconCount,
    };
  }
}
