import type { EngineConfig, ScoringWeights } from "../constants";
import { InvalidWeightError } from "../errors";
import {
  FACTOR_LABELS,
  FACTOR_ORDER,
  type CandidateProfile,
  type FactorName,
  type FactorScore,
  type GapReport,
  type RoleRequirement,
  type ScoreBreakdown
} from "../domain/models";
import { roundTo, toScore } from "../utils";

export type ScoringOptions = Pick<
  EngineConfig,
  "weights" | "experienceCeilingYears" | "projectCeilingCount"
>;

interface FactorResult {
  score: number;
  details: string;
}

/** Full credit at or above `ceiling`, linear below it. */
export const saturatingScore = (value: number, ceiling: number): number => {
  if (!(ceiling > 0)) {
    return value > 0 ? 100 : 0;
  }
  if (value >= ceiling) {
    return 100;
  }
  return toScore((Math.max(0, value) / ceiling) * 100);
};

/**
 * Skill weights of a role, keyed by skill id. Every weight must be finite and
 * positive, each skill may be listed once, and the total must stay finite.
 */
export const roleSkillWeights = (role: RoleRequirement): Map<string, number> => {
  const weights = new Map<string, number>();
  role.skills.forEach(({ skillId, weight }) => {
    if (weights.has(skillId)) {
      throw new InvalidWeightError(`Role "${role.title}" lists skill "${skillId}" more than once`, {
        roleTitle: role.title,
        skillId
      });
    }
    if (!Number.isFinite(weight) || weight <= 0) {
      throw new InvalidWeightError(
        `Weight of skill "${skillId}" in role "${role.title}" must be a positive number`,
        { roleTitle: role.title, skillId, weight }
      );
    }
    weights.set(skillId, weight);
  });
  return weights;
};

const sumOf = (values: Iterable<number>): number => {
  let total = 0;
  for (const value of values) {
    total += value;
  }
  return total;
};

export const scoreTechnicalSkills = (gap: GapReport, role: RoleRequirement): FactorResult => {
  const weights = roleSkillWeights(role);
  if (weights.size === 0) {
    return { score: 100, details: "No specific skills required" };
  }
  const total = sumOf(weights.values());
  if (!Number.isFinite(total)) {
    throw new InvalidWeightError(`Skill weights of role "${role.title}" overflow when summed`, {
      roleTitle: role.title
    });
  }
  const matchedWeight = gap.matched.reduce((sum, id) => sum + (weights.get(id) ?? 0), 0);

  return {
    score: toScore((100 * matchedWeight) / total),
    details: `Matched ${gap.matched.length}/${weights.size} required skills`
  };
};

export const scoreExperience = (years: number, ceilingYears: number): FactorResult => ({
  score: saturatingScore(years, ceilingYears),
  details:
    years >= ceilingYears
      ? `${years} years of experience`
      : `${years} years of experience (target: ${ceilingYears})`
});

export const scoreProjects = (count: number, ceilingCount: number): FactorResult => ({
  score: saturatingScore(count, ceilingCount),
  details:
    count >= ceilingCount
      ? `${count} projects in portfolio`
      : `${count} projects (recommended: ${ceilingCount})`
});

export const scoreTools = (candidateTools: Iterable<string>, roleTools: string[]): FactorResult => {
  const relevant = new Set(roleTools);
  if (relevant.size === 0) {
    return { score: 100, details: "No specific tools required" };
  }
  const held = new Set(candidateTools);
  let present = 0;
  relevant.forEach(tool => {
    if (held.has(tool)) {
      present += 1;
    }
  });
  return {
    score: toScore((100 * present) / relevant.size),
    details: `Uses ${present}/${relevant.size} role tools`
  };
};

/** Normalizes the configured weights by their sum. */
export const normalizeWeights = (weights: ScoringWeights): ScoringWeights => {
  FACTOR_ORDER.forEach(factor => {
    const weight = weights[factor];
    if (!Number.isFinite(weight) || weight < 0) {
      throw new InvalidWeightError(`Weight "${factor}" must be a non-negative number`, {
        factor,
        weight
      });
    }
  });
  const sum = sumOf(FACTOR_ORDER.map(factor => weights[factor]));
  if (!Number.isFinite(sum)) {
    throw new InvalidWeightError("Scoring weights overflow when summed", { weights: { ...weights } });
  }
  if (sum === 0) {
    throw new InvalidWeightError("Scoring weights must not all be zero", { weights: { ...weights } });
  }
  return {
    technical: weights.technical / sum,
    experience: weights.experience / sum,
    project: weights.project / sum,
    tool: weights.tool / sum
  };
};

export const scoreReadiness = (
  gap: GapReport,
  role: RoleRequirement,
  profile: CandidateProfile,
  options: ScoringOptions
): ScoreBreakdown => {
  const normalized = normalizeWeights(options.weights);
  const results: Record<FactorName, FactorResult> = {
    technical: scoreTechnicalSkills(gap, role),
    experience: scoreExperience(profile.yearsOfExperience, options.experienceCeilingYears),
    project: scoreProjects(profile.projectCount, options.projectCeilingCount),
    tool: scoreTools(profile.tools, role.tools)
  };

  const factors: FactorScore[] = FACTOR_ORDER.map(factor => ({
    factor,
    label: FACTOR_LABELS[factor],
    score: results[factor].score,
    weight: roundTo(normalized[factor], 4),
    contribution: roundTo(results[factor].score * normalized[factor]),
    details: results[factor].details
  }));

  const overall = FACTOR_ORDER.reduce(
    (sum, factor) => sum + results[factor].score * normalized[factor],
    0
  );

  return {
    overallScore: toScore(overall),
    factors,
    factorScores: {
      technical: results.technical.score,
      experience: results.experience.score,
      project: results.project.score,
      tool: results.tool.score
    }
  };
};
