import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import type { CandidateProfile, SkillGraph } from "@skill-readiness/core";
import {
  buildSkillGraph,
  parseCatalogDocument,
  parseJson,
  parseProfileDocuments,
  parseRoleDocuments
} from "./catalogLoader";
import { InMemoryProfileProvider, InMemoryRoleProvider } from "./providers";

const dataFile = (name: string): string =>
  fileURLToPath(new URL(`../data/${name}`, import.meta.url));

const readDataJson = (name: string): unknown =>
  parseJson(readFileSync(dataFile(name), "utf8"), name);

export interface DefaultCatalog {
  graph: SkillGraph;
  roles: InMemoryRoleProvider;
  durations: Record<string, number>;
}

/** The bundled catalog: technology skills, their prerequisites and five roles. */
export const loadDefaultCatalog = (): DefaultCatalog => {
  const document = parseCatalogDocument(readDataJson("catalog.json"));
  return {
    graph: buildSkillGraph(document),
    roles: new InMemoryRoleProvider(parseRoleDocuments(readDataJson("roles.json"))),
    durations: document.durations
  };
};

export const loadSampleProfiles = (): InMemoryProfileProvider =>
  new InMemoryProfileProvider(loadSampleProfileList());

export const loadSampleProfileList = (): CandidateProfile[] =>
  parseProfileDocuments(readDataJson("profiles.json"));
