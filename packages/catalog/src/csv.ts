import Papa from "papaparse";
import {
  CatalogFormatError,
  createModuleLogger,
  type CandidateProfile,
  type RoleRequirement,
  type SkillGraph
} from "@skill-readiness/core";
import { buildSkillGraph, parseCatalogDocument, parseProfileDocuments, parseRoleDocuments } from "./catalogLoader";

const log = createModuleLogger("catalog-csv");

type CsvRecord = Partial<Record<string, string>>;

export const readCsv = (text: string, source: string): CsvRecord[] => {
  const result = Papa.parse<CsvRecord>(text.trim(), {
    header: true,
    skipEmptyLines: true,
    transformHeader: header => header.trim()
  });
  if (result.errors.length > 0) {
    const [first] = result.errors;
    const error = new CatalogFormatError(`${source}: ${first.message}`, {
      source,
      row: first.row === undefined ? undefined : first.row + 2
    });
    log.logError(error, "Rejected CSV input");
    throw error;
  }
  return result.data;
};

const cell = (record: CsvRecord, key: string): string => (record[key] ?? "").trim();

const toNumber = (value: string, label: string, source: string, row: number): number | undefined => {
  if (value === "") {
    return undefined;
  }
  const parsed = Number(value);
  if (Number.isNaN(parsed)) {
    throw new CatalogFormatError(`${source} row ${row}: ${label} must be numeric`, {
      source,
      row,
      value
    });
  }
  return parsed;
};

const splitList = (value: string): string[] =>
  value
    .split(";")
    .map(item => item.trim())
    .filter(Boolean);

export interface CsvCatalog {
  graph: SkillGraph;
  durations: Record<string, number>;
}

/**
 * Skills CSV columns: id,category,difficulty,label,weeks.
 * Prerequisites CSV columns: skill,prerequisite,importance.
 */
export const loadCatalogFromCsv = (options: {
  skillsCsv: string;
  prerequisitesCsv?: string;
}): CsvCatalog => {
  const skills = readCsv(options.skillsCsv, "skills CSV").map((record, index) => {
    const row = index + 2;
    return {
      id: cell(record, "id"),
      category: cell(record, "category") || undefined,
      difficulty: toNumber(cell(record, "difficulty"), "difficulty", "skills CSV", row),
      label: cell(record, "label") || undefined,
      weeks: toNumber(cell(record, "weeks"), "weeks", "skills CSV", row)
    };
  });
  const prerequisites = options.prerequisitesCsv
    ? readCsv(options.prerequisitesCsv, "prerequisites CSV").map(record => ({
        skill: cell(record, "skill"),
        prerequisite: cell(record, "prerequisite"),
        importance: cell(record, "importance") || undefined
      }))
    : [];

  const durations: Record<string, number> = {};
  skills.forEach(skill => {
    if (skill.weeks !== undefined) {
      durations[skill.id] = skill.weeks;
    }
  });

  const document = parseCatalogDocument({
    skills: skills.map(({ weeks: _weeks, ...skill }) => skill),
    prerequisites,
    durations
  });
  return { graph: buildSkillGraph(document), durations: document.durations };
};

/**
 * Roles CSV columns: role,skill,weight,tool. A row names either a skill (with
 * an optional weight, default 1) or a tool. Roles keep first-seen order.
 */
export const parseRolesCsv = (text: string): RoleRequirement[] => {
  const roles = new Map<string, { title: string; skills: Array<{ skill: string; weight?: number }>; tools: string[] }>();
  readCsv(text, "roles CSV").forEach((record, index) => {
    const row = index + 2;
    const title = cell(record, "role");
    const role = roles.get(title) ?? { title, skills: [], tools: [] };
    const skill = cell(record, "skill");
    const tool = cell(record, "tool");
    if (skill) {
      role.skills.push({ skill, weight: toNumber(cell(record, "weight"), "weight", "roles CSV", row) });
    }
    if (tool) {
      role.tools.push(tool);
    }
    roles.set(title, role);
  });
  return parseRoleDocuments(Array.from(roles.values()));
};

/**
 * Profiles CSV columns: id,yearsOfExperience,projectCount,skills,tools where
 * skills and tools are `;`-separated lists.
 */
export const parseProfilesCsv = (text: string): CandidateProfile[] =>
  parseProfileDocuments(
    readCsv(text, "profiles CSV").map((record, index) => {
      const row = index + 2;
      return {
        id: cell(record, "id"),
        yearsOfExperience: toNumber(cell(record, "yearsOfExperience"), "yearsOfExperience", "profiles CSV", row),
        projectCount: toNumber(cell(record, "projectCount"), "projectCount", "profiles CSV", row),
        skills: splitList(cell(record, "skills")),
        tools: splitList(cell(record, "tools"))
      };
    })
  );
