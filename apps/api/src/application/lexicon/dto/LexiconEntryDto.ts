export interface LexiconEntryDto {
  strongsNumber: string;
  definition: string;
}
