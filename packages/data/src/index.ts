export { parseCsvRecords } from "./csv";
export type { CsvRecord } from "./csv";
export {
  DEFAULT_GUESSING,
  ITEM_COLUMNS,
  PREREQUISITE_COLUMNS,
  loadCatalogFromCsv,
  parseItemBankJson,
  parseItemsCsv,
  parsePrerequisitesCsv
} from "./catalogLoader";
export type { CatalogBundle, CatalogSources } from "./catalogLoader";
export { parseEngineConstantsCsv } from "./constantsCsv";
export { LearnerProfileSchema, decodeProfile, encodeProfile } from "./profileCodec";
export { FileProfileStore, InMemoryProfileStore } from "./profileStore";
export type { ProfileStore } from "./profileStore";
