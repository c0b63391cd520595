import type {
  GapReport,
  PrerequisiteImportance,
  RoleRequirement,
  TransitiveGap
} from "../domain/models";
import type { SkillGraphReader } from "../domain/skillGraph";
import { compareIds, uniqueInOrder } from "../utils";

interface Reach {
  importance: PrerequisiteImportance;
  introducedBy: Set<string>;
}

const weaker = (
  a: PrerequisiteImportance,
  b: PrerequisiteImportance
): PrerequisiteImportance => (a === "required" && b === "required" ? "required" : "recommended");

/**
 * Walks the prerequisite closure of one missing role skill. A prerequisite is
 * `required` only when some path to it uses required edges throughout; a node
 * first reached as `recommended` is walked again if a required path shows up.
 */
const expandPrerequisites = (
  rootId: string,
  graph: SkillGraphReader,
  reached: Map<string, Reach>
): void => {
  const best = new Map<string, PrerequisiteImportance>();
  const stack: Array<[string, PrerequisiteImportance]> = [[rootId, "required"]];

  while (stack.length) {
    const entry = stack.pop();
    if (!entry) {
      break;
    }
    const [current, pathImportance] = entry;
    graph.prerequisiteEdgesOf(current).forEach(edge => {
      const importance = weaker(pathImportance, edge.importance);
      const seen = best.get(edge.prerequisiteId);
      if (seen === "required" || seen === importance) {
        return;
      }
      best.set(edge.prerequisiteId, importance);

      const reach = reached.get(edge.prerequisiteId) ?? {
        importance,
        introducedBy: new Set<string>()
      };
      if (importance === "required") {
        reach.importance = "required";
      }
      reach.introducedBy.add(rootId);
      reached.set(edge.prerequisiteId, reach);

      if (graph.hasSkill(edge.prerequisiteId)) {
        stack.push([edge.prerequisiteId, importance]);
      }
    });
  }
};

export const analyzeGap = (
  candidateSkills: Iterable<string>,
  role: RoleRequirement,
  graph: SkillGraphReader
): GapReport => {
  const held = new Set(candidateSkills);
  const requiredIds = uniqueInOrder(role.skills.map(skill => skill.skillId));
  const requiredSet = new Set(requiredIds);

  const matched = requiredIds.filter(id => held.has(id));
  const directlyMissing = requiredIds.filter(id => !held.has(id));
  const unknownSkills = requiredIds.filter(id => !graph.hasSkill(id));

  const reached = new Map<string, Reach>();
  directlyMissing
    .filter(id => graph.hasSkill(id))
    .forEach(id => expandPrerequisites(id, graph, reached));

  const transitivelyMissing: TransitiveGap[] = Array.from(reached.entries())
    .filter(([skillId]) => !held.has(skillId) && !requiredSet.has(skillId))
    .map(([skillId, reach]) => ({
      skillId,
      importance: reach.importance,
      introducedBy: Array.from(reach.introducedBy).sort(compareIds)
    }))
    .sort((a, b) => compareIds(a.skillId, b.skillId));

  const transitiveRequired = transitivelyMissing
    .filter(gap => gap.importance === "required")
    .map(gap => gap.skillId);
  const missingRecommended = transitivelyMissing
    .filter(gap => gap.importance === "recommended")
    .map(gap => gap.skillId);

  const extraSkills = Array.from(held)
    .filter(id => !requiredSet.has(id))
    .sort(compareIds);

  return {
    roleTitle: role.title,
    matched,
    missingRequired: [...directlyMissing, ...transitiveRequired],
    missingRecommended,
    directlyMissing,
    transitivelyMissing,
    extraSkills,
    unknownSkills
  };
};
