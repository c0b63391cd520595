export {
  skillRecordSchema,
  prerequisiteRecordSchema,
  catalogDocumentSchema,
  roleDocumentSchema,
  profileDocumentSchema
} from "./schemas";
export type { CatalogDocument, RoleDocument, ProfileDocument } from "./schemas";
export {
  parseJson,
  parseCatalogDocument,
  buildSkillGraph,
  parseRoleDocuments,
  parseProfileDocuments,
  toRoleRequirement,
  toCandidateProfile
} from "./catalogLoader";
export {
  readCsv,
  loadCatalogFromCsv,
  parseRolesCsv,
  parseProfilesCsv
} from "./csv";
export type { CsvCatalog } from "./csv";
export { parseEngineConfigCsv, loadEngineConfigCsv } from "./configCsv";
export {
  InMemoryRoleProvider,
  InMemoryProfileProvider,
  StaticCatalogProvider
} from "./providers";
export { loadDefaultCatalog, loadSampleProfiles, loadSampleProfileList } from "./defaults";
export type { DefaultCatalog } from "./defaults";
