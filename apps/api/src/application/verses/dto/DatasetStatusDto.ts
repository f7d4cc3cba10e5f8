export interface DatasetStatusDto {
  status: "Healthy";
  initialized: boolean;
  versesCount: number;
  lexiconCount: number;
}
