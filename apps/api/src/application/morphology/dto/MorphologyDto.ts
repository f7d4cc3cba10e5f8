import { MorphologyInfo } from "../../../domain/morphology/entities/MorphologyInfo";

export interface MorphologyDto {
  code: string;
  morph: MorphologyInfo;
}
