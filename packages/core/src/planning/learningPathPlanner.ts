import { analyzeGap } from "../analysis/gapAnalyzer";
import { DEFAULT_DIFFICULTY } from "../constants";
import { CycleError, UnknownSkillError } from "../errors";
import type {
  GapReport,
  LearningPath,
  LearningStep,
  PrerequisiteImportance
} from "../domain/models";
import type { SkillGraphReader } from "../domain/skillGraph";
import { compareIds } from "../utils";

export interface PlanTarget {
  skillId: string;
  importance: PrerequisiteImportance;
}

export interface PlanOptions {
  durations?: Readonly<Record<string, number>>; // weeks per skill
  tiers?: Readonly<Record<string, number>>;
}

export interface PlanRequest extends PlanOptions {
  target: string;
  graph: SkillGraphReader;
  skills: PlanTarget[];
  heldSkills: Iterable<string>;
}

export interface GapPlanOptions extends PlanOptions {
  includeRecommended?: boolean;
}

interface PlanNode {
  importance: PrerequisiteImportance;
  prerequisites: string[]; // inside the plan
  satisfied: string[];
  deferred: string[];
  dependents: string[];
  inDegree: number;
}

const lookup = (table: Readonly<Record<string, number>> | undefined, key: string): number | undefined =>
  table && Object.prototype.hasOwnProperty.call(table, key) ? table[key] : undefined;

/**
 * Orders the target skills with Kahn's algorithm. Among skills whose
 * prerequisites are all scheduled, the lowest tier goes first, then the
 * smallest id.
 */
export const planLearningPath = (request: PlanRequest): LearningPath => {
  const { graph } = request;
  const held = new Set(request.heldSkills);

  const nodes = new Map<string, PlanNode>();
  request.skills.forEach(({ skillId, importance }) => {
    if (held.has(skillId)) {
      return;
    }
    const existing = nodes.get(skillId);
    if (existing) {
      existing.importance = existing.importance === "required" ? "required" : importance;
      return;
    }
    nodes.set(skillId, {
      importance,
      prerequisites: [],
      satisfied: [],
      deferred: [],
      dependents: [],
      inDegree: 0
    });
  });

  nodes.forEach((node, skillId) => {
    const edges = graph.hasSkill(skillId) ? graph.prerequisiteEdgesOf(skillId) : [];
    edges.forEach(({ prerequisiteId }) => {
      const prerequisite = nodes.get(prerequisiteId);
      if (prerequisite) {
        node.prerequisites.push(prerequisiteId);
        node.inDegree += 1;
        prerequisite.dependents.push(skillId);
      } else if (held.has(prerequisiteId)) {
        node.satisfied.push(prerequisiteId);
      } else {
        node.deferred.push(prerequisiteId);
      }
    });
  });

  const tierOf = (skillId: string): number =>
    lookup(request.tiers, skillId) ?? graph.getSkill(skillId)?.difficulty ?? DEFAULT_DIFFICULTY;

  const ready: string[] = [];
  nodes.forEach((node, skillId) => {
    if (node.inDegree === 0) {
      ready.push(skillId);
    }
  });

  const scheduled = new Set<string>();
  const steps: LearningStep[] = [];
  while (ready.length) {
    ready.sort((a, b) => tierOf(a) - tierOf(b) || compareIds(a, b));
    const current = ready.shift();
    const node = current === undefined ? undefined : nodes.get(current);
    if (current === undefined || !node) {
      break;
    }

    const difficulty = tierOf(current);
    steps.push({
      skillId: current,
      position: steps.length + 1,
      estimatedWeeks: lookup(request.durations, current) ?? difficulty,
      difficulty,
      category: graph.getSkill(current)?.category ?? "Uncategorized",
      importance: node.importance,
      unmetPrerequisites: node.prerequisites.filter(id => !scheduled.has(id)),
      satisfiedPrerequisites: [...node.satisfied].sort(compareIds),
      deferredPrerequisites: [...node.deferred].sort(compareIds)
    });
    scheduled.add(current);

    node.dependents.forEach(dependentId => {
      const dependent = nodes.get(dependentId);
      if (!dependent) {
        return;
      }
      dependent.inDegree -= 1;
      if (dependent.inDegree === 0) {
        ready.push(dependentId);
      }
    });
  }

  if (scheduled.size < nodes.size) {
    const remaining = Array.from(nodes.keys())
      .filter(id => !scheduled.has(id))
      .sort(compareIds);
    throw new CycleError(
      `Prerequisites of ${remaining.join(", ")} form a cycle; no learning order exists`,
      remaining
    );
  }

  return {
    target: request.target,
    steps,
    totalWeeks: steps.reduce((sum, step) => sum + step.estimatedWeeks, 0)
  };
};

/**
 * Plans the skills a gap report marks as missing. Skills the candidate holds
 * are the report's matched and extra skills.
 */
export const planFromGap = (
  gap: GapReport,
  graph: SkillGraphReader,
  options: GapPlanOptions = {}
): LearningPath => {
  const { includeRecommended = false, durations, tiers } = options;
  const skills: PlanTarget[] = gap.missingRequired.map(skillId => ({
    skillId,
    importance: "required"
  }));
  if (includeRecommended) {
    gap.missingRecommended.forEach(skillId => skills.push({ skillId, importance: "recommended" }));
  }
  return planLearningPath({
    target: gap.roleTitle,
    graph,
    skills,
    heldSkills: [...gap.matched, ...gap.extraSkills],
    durations,
    tiers
  });
};

/** Path to a single skill through every prerequisite the candidate lacks. */
export const planForSkill = (
  graph: SkillGraphReader,
  skillId: string,
  heldSkills: Iterable<string>,
  options: PlanOptions = {}
): LearningPath => {
  if (!graph.hasSkill(skillId)) {
    throw new UnknownSkillError(skillId);
  }
  const gap = analyzeGap(
    heldSkills,
    { title: skillId, skills: [{ skillId, weight: 1 }], tools: [] },
    graph
  );
  return planFromGap(gap, graph, { ...options, includeRecommended: true });
};
