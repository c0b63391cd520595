import { z } from "zod";
import {
  CatalogFormatError,
  SkillGraph,
  createModuleLogger,
  type CandidateProfile,
  type RoleRequirement
} from "@skill-readiness/core";
import {
  catalogDocumentSchema,
  profileDocumentSchema,
  roleDocumentSchema,
  type CatalogDocument,
  type ProfileDocument,
  type RoleDocument
} from "./schemas";

const log = createModuleLogger("catalog");

const validate = <T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown, source: string): T => {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      issue => `${issue.path.join(".") || "(root)"}: ${issue.message}`
    );
    throw new CatalogFormatError(`Invalid ${source}: ${issues.join("; ")}`, { source, issues });
  }
  return parsed.data;
};

export const parseJson = (text: string, source: string): unknown => {
  try {
    return JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CatalogFormatError(`${source} is not valid JSON: ${reason}`, { source });
  }
};

export const parseCatalogDocument = (input: unknown): CatalogDocument =>
  validate(catalogDocumentSchema, input, "skill catalog");

/**
 * Registers every skill before any edge, so edges may reference skills listed
 * later in the document. Graph errors (duplicates, unknown endpoints, cycles)
 * propagate unchanged.
 */
export const buildSkillGraph = (document: CatalogDocument): SkillGraph => {
  const graph = SkillGraph.from({
    skills: document.skills.map(skill => ({
      id: skill.id,
      category: skill.category,
      difficulty: skill.difficulty,
      label: skill.label
    })),
    edges: document.prerequisites.map(edge => ({
      skillId: edge.skill,
      prerequisiteId: edge.prerequisite,
      importance: edge.importance
    }))
  });
  log.info("Loaded skill catalog", {
    skills: graph.size,
    prerequisites: document.prerequisites.length
  });
  return graph;
};

export const toRoleRequirement = (document: RoleDocument): RoleRequirement => ({
  title: document.title,
  skills: document.skills.map(entry => ({ skillId: entry.skill, weight: entry.weight })),
  tools: [...new Set(document.tools)]
});

export const parseRoleDocuments = (input: unknown): RoleRequirement[] =>
  validate(z.array(roleDocumentSchema), input, "role requirements").map(toRoleRequirement);

export const toCandidateProfile = (document: ProfileDocument): CandidateProfile => ({
  id: document.id,
  skills: [...new Set(document.skills)],
  yearsOfExperience: document.yearsOfExperience,
  projectCount: document.projectCount,
  tools: [...new Set(document.tools)]
});

export const parseProfileDocuments = (input: unknown): CandidateProfile[] =>
  validate(z.array(profileDocumentSchema), input, "candidate profiles").map(toCandidateProfile);
