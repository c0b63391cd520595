import { READINESS_LEVEL_BANDS, type EngineConfig } from "../constants";
import {
  FACTOR_LABELS,
  FACTOR_ORDER,
  type Explanation,
  type FactorName,
  type GapReport,
  type ReadinessLevel,
  type RoleRequirement,
  type ScoreBreakdown,
  type SkillRecommendation
} from "../domain/models";
import type { SkillGraphReader } from "../domain/skillGraph";
import { roleSkillWeights } from "../scoring/scoringEngine";
import { compareIds, roundTo } from "../utils";

export type ExplanationOptions = Pick<
  EngineConfig,
  "strengthThreshold" | "weaknessThreshold" | "recommendationCount"
>;

const FACTOR_ADVICE: Record<FactorName, string> = {
  technical: "Close the required skill gaps first, starting with the top recommendations",
  experience: "Gain practical experience through internships or freelance projects",
  project: "Build 2-3 projects showcasing your skills",
  tool: "Practice with the tools this role uses day to day"
};

export const toReadinessLevel = (score: number): ReadinessLevel => {
  const band = READINESS_LEVEL_BANDS.find(([min]) => score >= min);
  return band ? band[1] : "developing";
};

const factorRank = (factor: FactorName): number => FACTOR_ORDER.indexOf(factor);

const classifyFactors = (
  scores: ScoreBreakdown,
  options: ExplanationOptions
): { strengths: FactorName[]; weaknesses: FactorName[] } => {
  const entries = scores.factors.map(({ factor, score }) => ({ factor, score }));
  const strengths = entries
    .filter(entry => entry.score >= options.strengthThreshold)
    .sort((a, b) => b.score - a.score || factorRank(a.factor) - factorRank(b.factor))
    .map(entry => entry.factor);
  const weaknesses = entries
    .filter(entry => entry.score < options.weaknessThreshold)
    .sort((a, b) => a.score - b.score || factorRank(a.factor) - factorRank(b.factor))
    .map(entry => entry.factor);
  return { strengths, weaknesses };
};

/**
 * Weight used to rank a missing skill: its role weight, or for a prerequisite
 * pulled in transitively, the largest weight among the role skills behind it.
 */
const recommendationWeights = (gap: GapReport, role: RoleRequirement): Map<string, number> => {
  const roleWeights = roleSkillWeights(role);
  const weights = new Map(roleWeights);
  gap.transitivelyMissing.forEach(entry => {
    if (weights.has(entry.skillId)) {
      return;
    }
    const inherited = entry.introducedBy.reduce(
      (max, id) => Math.max(max, roleWeights.get(id) ?? 0),
      0
    );
    weights.set(entry.skillId, inherited);
  });
  return weights;
};

export const rankRecommendations = (
  gap: GapReport,
  role: RoleRequirement,
  graph: SkillGraphReader,
  count: number
): SkillRecommendation[] => {
  if (count <= 0 || gap.missingRequired.length === 0) {
    return [];
  }
  const weights = recommendationWeights(gap, role);
  return Array.from(new Set(gap.missingRequired))
    .map(skillId => {
      const weight = weights.get(skillId) ?? 0;
      const unlocks = graph.hasSkill(skillId) ? graph.dependentsOf(skillId).size : 0;
      return { skillId, weight, unlocks, priority: weight * (1 + unlocks) };
    })
    .sort((a, b) => b.priority - a.priority || compareIds(a.skillId, b.skillId))
    .slice(0, count)
    .map((entry, index) => ({
      ...entry,
      priority: roundTo(entry.priority, 4),
      rank: index + 1,
      message:
        entry.unlocks > 0
          ? `Learn ${entry.skillId} (unlocks ${entry.unlocks} ${entry.unlocks === 1 ? "skill" : "skills"})`
          : `Learn ${entry.skillId}`
    }));
};

const describe = (factors: FactorName[]): string =>
  factors.map(factor => FACTOR_LABELS[factor]).join(", ");

const buildSummary = (
  roleTitle: string,
  overall: number,
  level: ReadinessLevel,
  strengths: FactorName[],
  weaknesses: FactorName[]
): string => {
  const parts = [`Readiness for ${roleTitle} is ${level} at ${overall.toFixed(1)}%.`];
  if (strengths.length) {
    parts.push(`Strong areas: ${describe(strengths)}.`);
  }
  if (weaknesses.length) {
    parts.push(`Areas for improvement: ${describe(weaknesses)}.`);
  }
  return parts.join(" ");
};

/**
 * Turns a score breakdown and gap report into strengths, weaknesses and
 * ranked recommendations. Empty inputs produce empty lists. Role weights are
 * checked the same way scoring checks them.
 */
export const explainReadiness = (
  scores: ScoreBreakdown,
  gap: GapReport,
  role: RoleRequirement,
  graph: SkillGraphReader,
  options: ExplanationOptions
): Explanation => {
  const { strengths, weaknesses } = classifyFactors(scores, options);
  const readinessLevel = toReadinessLevel(scores.overallScore);
  const recommendations = rankRecommendations(gap, role, graph, options.recommendationCount);

  const advice = weaknesses.map(factor => FACTOR_ADVICE[factor]);
  if (!advice.length) {
    advice.push("Continue building on your strong foundation");
  }

  return {
    readinessLevel,
    strengths,
    weaknesses,
    recommendations,
    advice,
    summary: buildSummary(role.title, scores.overallScore, readinessLevel, strengths, weaknesses)
  };
};
