import { analyzeGap } from "../analysis/gapAnalyzer";
import { resolveEngineConfig, type EngineConfigInput } from "../config";
import type { EngineConfig } from "../constants";
import type {
  CandidateProfile,
  GapReport,
  LearningPath,
  ReadinessResult,
  RoleRequirement
} from "../domain/models";
import type { SkillGraph } from "../domain/skillGraph";
import { UnknownRoleError } from "../errors";
import { explainReadiness } from "../explanation/explanationGenerator";
import { createModuleLogger } from "../logger";
import {
  planForSkill,
  planFromGap,
  type GapPlanOptions,
  type PlanOptions
} from "../planning/learningPathPlanner";
import type { RoleRequirementProvider } from "../providers";
import { roleSkillWeights, scoreReadiness } from "../scoring/scoringEngine";
import { deepFreeze } from "../utils";

const log = createModuleLogger("readiness-engine");

/**
 * Context object for readiness calls: the skill graph, the role catalog and
 * the resolved configuration. Every call reads them without mutating, so one
 * engine can serve any number of candidates.
 */
export class ReadinessEngine {
  private graph: SkillGraph;
  private roles: RoleRequirementProvider;
  private config: EngineConfig;

  constructor(graph: SkillGraph, roles: RoleRequirementProvider, config: EngineConfigInput = {}) {
    this.graph = graph;
    this.roles = roles;
    this.config = resolveEngineConfig(config);
  }

  /** Publishes a new graph; callers that already hold the old one keep it. */
  public setGraph(graph: SkillGraph): void {
    this.graph = graph;
    log.info("Skill graph replaced", { skills: graph.size });
  }

  public getGraph(): SkillGraph {
    return this.graph;
  }

  public setConfig(config: EngineConfigInput): void {
    this.config = resolveEngineConfig(config, this.config);
  }

  public getConfig(): EngineConfig {
    return {
      ...this.config,
      weights: { ...this.config.weights }
    };
  }

  /** Looks up a role and checks its skill weights before any call uses it. */
  public getRole(roleTitle: string): RoleRequirement {
    const role = this.roles.getRole(roleTitle);
    if (!role) {
      throw new UnknownRoleError(roleTitle);
    }
    roleSkillWeights(role);
    return role;
  }

  public analyzeGap(profile: CandidateProfile, roleTitle: string): GapReport {
    return analyzeGap(profile.skills, this.getRole(roleTitle), this.graph);
  }

  public assess(profile: CandidateProfile, roleTitle: string): ReadinessResult {
    const graph = this.graph;
    const config = this.config;
    const role = this.getRole(roleTitle);

    const gap = analyzeGap(profile.skills, role, graph);
    const scores = scoreReadiness(gap, role, profile, config);
    const explanation = explainReadiness(scores, gap, role, graph, config);

    log.debug("Assessed readiness", {
      roleTitle,
      overallScore: scores.overallScore,
      missingRequired: gap.missingRequired.length
    });

    return deepFreeze({
      roleTitle: role.title,
      overallScore: scores.overallScore,
      readinessLevel: explanation.readinessLevel,
      factorScores: scores.factorScores,
      factors: scores.factors,
      matchedSkills: gap.matched,
      missingSkills: {
        required: gap.missingRequired,
        recommended: gap.missingRecommended
      },
      extraSkills: gap.extraSkills,
      strengths: explanation.strengths,
      weaknesses: explanation.weaknesses,
      recommendations: explanation.recommendations,
      advice: explanation.advice,
      summary: explanation.summary
    });
  }

  public planLearningPath(
    profile: CandidateProfile,
    roleTitle: string,
    options: GapPlanOptions = {}
  ): LearningPath {
    const graph = this.graph;
    const gap = analyzeGap(profile.skills, this.getRole(roleTitle), graph);
    const path = planFromGap(gap, graph, options);
    log.debug("Planned learning path", {
      roleTitle,
      steps: path.steps.length,
      totalWeeks: path.totalWeeks
    });
    return deepFreeze(path);
  }

  public planForSkill(profile: CandidateProfile, skillId: string, options: PlanOptions = {}): LearningPath {
    return deepFreeze(planForSkill(this.graph, skillId, profile.skills, options));
  }
}
