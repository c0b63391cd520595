import {
  CatalogFormatError,
  type CandidateProfile,
  type ProfileProvider,
  type RoleRequirement,
  type RoleRequirementProvider,
  type SkillCatalogProvider,
  type SkillGraph
} from "@skill-readiness/core";
import { buildSkillGraph } from "./catalogLoader";
import type { CatalogDocument } from "./schemas";

export class InMemoryRoleProvider implements RoleRequirementProvider {
  private readonly roles = new Map<string, RoleRequirement>();

  constructor(roles: RoleRequirement[] = []) {
    roles.forEach(role => this.register(role));
  }

  /** Adds or replaces a role by title. */
  public register(role: RoleRequirement): void {
    this.roles.set(role.title, role);
  }

  public getRole(title: string): RoleRequirement | undefined {
    return this.roles.get(title);
  }

  public listRoles(): string[] {
    return Array.from(this.roles.keys());
  }
}

export class InMemoryProfileProvider implements ProfileProvider {
  private readonly profiles = new Map<string, CandidateProfile>();

  constructor(profiles: CandidateProfile[] = []) {
    profiles.forEach(profile => this.register(profile));
  }

  public register(profile: CandidateProfile): void {
    if (!profile.id) {
      throw new CatalogFormatError("Profiles registered with a provider need an id");
    }
    this.profiles.set(profile.id, profile);
  }

  public getProfile(candidateId: string): CandidateProfile | undefined {
    return this.profiles.get(candidateId);
  }
}

export class StaticCatalogProvider implements SkillCatalogProvider {
  constructor(private readonly document: CatalogDocument) {}

  public loadGraph(): SkillGraph {
    return buildSkillGraph(this.document);
  }
}
