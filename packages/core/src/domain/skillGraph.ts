import { CycleError, DuplicateSkillError, UnknownSkillError } from "../errors";
import { createModuleLogger } from "../logger";
import type { PrerequisiteEdge, PrerequisiteImportance, Skill } from "./models";

const log = createModuleLogger("skill-graph");

/** Read side of the graph; what the analyzers and the planner depend on. */
export interface SkillGraphReader {
  hasSkill(skillId: string): boolean;
  getSkill(skillId: string): Skill | undefined;
  prerequisiteEdgesOf(skillId: string): PrerequisiteEdge[];
  dependentsOf(skillId: string, transitive?: boolean): Set<string>;
}

export interface SkillGraphDefinition {
  skills: Skill[];
  edges: PrerequisiteEdge[];
}

/**
 * Prerequisite DAG over the skill catalog. `adjacency` maps a skill to its
 * prerequisites, `reverseAdjacency` maps a prerequisite to the skills that
 * require it.
 */
export class SkillGraph implements SkillGraphReader {
  private readonly skillsById = new Map<string, Skill>();
  private readonly adjacency = new Map<string, Map<string, PrerequisiteImportance>>();
  private readonly reverseAdjacency = new Map<string, Set<string>>();

  public static from(definition: SkillGraphDefinition): SkillGraph {
    const graph = new SkillGraph();
    definition.skills.forEach(skill => graph.addSkill(skill));
    definition.edges.forEach(edge =>
      graph.addPrerequisite(edge.skillId, edge.prerequisiteId, edge.importance)
    );
    return graph;
  }

  public get size(): number {
    return this.skillsById.size;
  }

  public addSkill(skill: Skill): void {
    if (this.skillsById.has(skill.id)) {
      log.warn("Rejected duplicate skill", { skillId: skill.id });
      throw new DuplicateSkillError(skill.id);
    }
    this.skillsById.set(skill.id, Object.freeze({ ...skill }));
    this.adjacency.set(skill.id, new Map());
    this.reverseAdjacency.set(skill.id, new Set());
    log.debug("Added skill", { skillId: skill.id, category: skill.category });
  }

  /**
   * Records that `skillId` requires `prerequisiteId`. The edge is checked
   * before insertion, so a rejected edge leaves the graph untouched.
   * Re-adding an existing edge keeps the stricter importance.
   */
  public addPrerequisite(
    skillId: string,
    prerequisiteId: string,
    importance: PrerequisiteImportance = "required"
  ): void {
    const prerequisites = this.adjacency.get(skillId);
    if (!prerequisites) {
      throw new UnknownSkillError(skillId, { prerequisiteId });
    }
    const dependents = this.reverseAdjacency.get(prerequisiteId);
    if (!dependents) {
      throw new UnknownSkillError(prerequisiteId, { dependentId: skillId });
    }

    const cyclePath = this.findPath(prerequisiteId, skillId);
    if (cyclePath) {
      const path = [skillId, ...cyclePath];
      log.warn("Rejected prerequisite edge that would create a cycle", {
        skillId,
        prerequisiteId,
        path
      });
      throw new CycleError(
        `Adding prerequisite "${prerequisiteId}" to "${skillId}" would create a cycle: ${path.join(" -> ")}`,
        path
      );
    }

    const existing = prerequisites.get(prerequisiteId);
    const next = existing === "required" ? "required" : importance;
    prerequisites.set(prerequisiteId, next);
    dependents.add(skillId);
    log.debug("Added prerequisite", { skillId, prerequisiteId, importance: next });
  }

  public hasSkill(skillId: string): boolean {
    return this.skillsById.has(skillId);
  }

  public getSkill(skillId: string): Skill | undefined {
    return this.skillsById.get(skillId);
  }

  public requireSkill(skillId: string): Skill {
    const skill = this.skillsById.get(skillId);
    if (!skill) {
      throw new UnknownSkillError(skillId);
    }
    return skill;
  }

  public skills(): Skill[] {
    return Array.from(this.skillsById.values());
  }

  public edges(): PrerequisiteEdge[] {
    const edges: PrerequisiteEdge[] = [];
    this.adjacency.forEach((prerequisites, skillId) => {
      prerequisites.forEach((importance, prerequisiteId) => {
        edges.push({ skillId, prerequisiteId, importance });
      });
    });
    return edges;
  }

  public prerequisiteEdgesOf(skillId: string): PrerequisiteEdge[] {
    return Array.from(this.requirePrerequisites(skillId), ([prerequisiteId, importance]) => ({
      skillId,
      prerequisiteId,
      importance
    }));
  }

  /** Direct prerequisites, or the whole upward closure when `transitive`. */
  public prerequisitesOf(skillId: string, transitive = false): Set<string> {
    const direct = this.requirePrerequisites(skillId);
    if (!transitive) {
      return new Set(direct.keys());
    }
    return this.closure(skillId, id => this.adjacency.get(id)?.keys() ?? []);
  }

  public dependentsOf(skillId: string, transitive = false): Set<string> {
    const direct = this.reverseAdjacency.get(skillId);
    if (!direct) {
      throw new UnknownSkillError(skillId);
    }
    if (!transitive) {
      return new Set(direct);
    }
    return this.closure(skillId, id => this.reverseAdjacency.get(id) ?? []);
  }

  /** Independent copy, used to publish a modified graph without touching readers of this one. */
  public clone(): SkillGraph {
    return SkillGraph.from({ skills: this.skills(), edges: this.edges() });
  }

  private requirePrerequisites(skillId: string): Map<string, PrerequisiteImportance> {
    const prerequisites = this.adjacency.get(skillId);
    if (!prerequisites) {
      throw new UnknownSkillError(skillId);
    }
    return prerequisites;
  }

  // Depth-first; the DAG property bounds the walk.
  private closure(start: string, next: (id: string) => Iterable<string>): Set<string> {
    const visited = new Set<string>();
    const stack = [...next(start)].reverse();
    while (stack.length) {
      const current = stack.pop();
      if (current === undefined || visited.has(current)) {
        continue;
      }
      visited.add(current);
      const following = [...next(current)].reverse();
      following.forEach(id => {
        if (!visited.has(id)) {
          stack.push(id);
        }
      });
    }
    return visited;
  }

  /** Prerequisite chain from `from` down to `to`, or null when `to` is unreachable. */
  private findPath(from: string, to: string): string[] | null {
    if (from === to) {
      return [from];
    }
    const parent = new Map<string, string>();
    const visited = new Set<string>([from]);
    const stack = [from];
    while (stack.length) {
      const current = stack.pop();
      if (current === undefined) {
        break;
      }
      for (const prerequisiteId of this.adjacency.get(current)?.keys() ?? []) {
        if (visited.has(prerequisiteId)) {
          continue;
        }
        parent.set(prerequisiteId, current);
        if (prerequisiteId === to) {
          const path = [to];
          let cursor = current;
          while (cursor !== from) {
            path.unshift(cursor);
            const up = parent.get(cursor);
            if (up === undefined) {
              break;
            }
            cursor = up;
          }
          path.unshift(from);
          return path;
        }
        visited.add(prerequisiteId);
        stack.push(prerequisiteId);
      }
    }
    return null;
  }
}
