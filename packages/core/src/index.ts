export * from "./domain/models";
export * from "./errors";
export {
  SkillGraph,
  type SkillGraphDefinition,
  type SkillGraphReader
} from "./domain/skillGraph";
export { analyzeGap } from "./analysis/gapAnalyzer";
export {
  scoreReadiness,
  scoreTechnicalSkills,
  scoreExperience,
  scoreProjects,
  scoreTools,
  roleSkillWeights,
  saturatingScore,
  normalizeWeights
} from "./scoring/scoringEngine";
export type { ScoringOptions } from "./scoring/scoringEngine";
export {
  explainReadiness,
  rankRecommendations,
  toReadinessLevel
} from "./explanation/explanationGenerator";
export type { ExplanationOptions } from "./explanation/explanationGenerator";
export {
  planLearningPath,
  planFromGap,
  planForSkill
} from "./planning/learningPathPlanner";
export type {
  PlanTarget,
  PlanOptions,
  PlanRequest,
  GapPlanOptions
} from "./planning/learningPathPlanner";
export { ReadinessEngine } from "./engine/readinessEngine";
export { ReadinessService } from "./services/readinessService";
export type {
  SkillCatalogProvider,
  RoleRequirementProvider,
  ProfileProvider
} from "./providers";
export {
  DEFAULT_ENGINE_CONFIG,
  DEFAULT_WEIGHTS,
  DEFAULT_DIFFICULTY
} from "./constants";
export type { EngineConfig, ScoringWeights } from "./constants";
export {
  engineConfigSchema,
  resolveEngineConfig,
  loadEngineConfigFromEnv,
  loadLoggingConfig
} from "./config";
export type { EngineConfigInput, LoggingConfig } from "./config";
export { createModuleLogger, getLogger, setLogger, ModuleLogger } from "./logger";
export { clamp, compareIds, roundTo, toScore } from "./utils";
