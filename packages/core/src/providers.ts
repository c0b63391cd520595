import type { CandidateProfile, RoleRequirement } from "./domain/models";
import type { SkillGraph } from "./domain/skillGraph";

/** Supplies the skill catalog; called once while the host starts up. */
export interface SkillCatalogProvider {
  loadGraph(): SkillGraph;
}

export interface RoleRequirementProvider {
  getRole(title: string): RoleRequirement | undefined;
  listRoles(): string[];
}

export interface ProfileProvider {
  getProfile(candidateId: string): CandidateProfile | undefined;
}
