import { z } from "zod";
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from "./constants";
import { ConfigError } from "./errors";

export type EngineConfigInput = Partial<Omit<EngineConfig, "weights">> & {
  weights?: Partial<EngineConfig["weights"]>;
};

const score = z.number().min(0).max(100);

// Weight signs and the zero-sum case are checked by the scoring engine, which
// reports them as InvalidWeightError at call time.
const weightsSchema = z.object({
  technical: z.number().finite(),
  experience: z.number().finite(),
  project: z.number().finite(),
  tool: z.number().finite()
});

export const engineConfigSchema = z
  .object({
    weights: weightsSchema,
    strengthThreshold: score,
    weaknessThreshold: score,
    recommendationCount: z.number().int().nonnegative(),
    experienceCeilingYears: z.number().positive().finite(),
    projectCeilingCount: z.number().positive().finite()
  })
  .refine(config => config.weaknessThreshold <= config.strengthThreshold, {
    message: "weaknessThreshold must not exceed strengthThreshold",
    path: ["weaknessThreshold"]
  });

const formatIssues = (error: z.ZodError): string[] =>
  error.issues.map(issue => `${issue.path.join(".") || "config"}: ${issue.message}`);

export const resolveEngineConfig = (
  input: EngineConfigInput = {},
  base: EngineConfig = DEFAULT_ENGINE_CONFIG
): EngineConfig => {
  const merged = {
    ...base,
    ...input,
    weights: { ...base.weights, ...input.weights }
  };
  const parsed = engineConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ConfigError(`Invalid engine configuration: ${issues.join("; ")}`, issues);
  }
  return parsed.data;
};

const envSchema = z.object({
  SKILL_READINESS_WEIGHT_TECHNICAL: z.coerce.number().optional(),
  SKILL_READINESS_WEIGHT_EXPERIENCE: z.coerce.number().optional(),
  SKILL_READINESS_WEIGHT_PROJECT: z.coerce.number().optional(),
  SKILL_READINESS_WEIGHT_TOOL: z.coerce.number().optional(),
  SKILL_READINESS_STRENGTH_THRESHOLD: z.coerce.number().optional(),
  SKILL_READINESS_WEAKNESS_THRESHOLD: z.coerce.number().optional(),
  SKILL_READINESS_RECOMMENDATION_COUNT: z.coerce.number().int().optional(),
  SKILL_READINESS_EXPERIENCE_CEILING_YEARS: z.coerce.number().optional(),
  SKILL_READINESS_PROJECT_CEILING_COUNT: z.coerce.number().optional()
});

type Env = Record<string, string | undefined>;

// Blank variables count as unset.
const withoutBlanks = (env: Env): Env =>
  Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== "")
  );

export const loadEngineConfigFromEnv = (env: Env = process.env): EngineConfigInput => {
  const parsed = envSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ConfigError(`Invalid environment configuration: ${issues.join("; ")}`, issues);
  }
  const values = parsed.data;
  const config: EngineConfigInput = {};
  const weights: Partial<EngineConfig["weights"]> = {};

  if (values.SKILL_READINESS_WEIGHT_TECHNICAL !== undefined) {
    weights.technical = values.SKILL_READINESS_WEIGHT_TECHNICAL;
  }
  if (values.SKILL_READINESS_WEIGHT_EXPERIENCE !== undefined) {
    weights.experience = values.SKILL_READINESS_WEIGHT_EXPERIENCE;
  }
  if (values.SKILL_READINESS_WEIGHT_PROJECT !== undefined) {
    weights.project = values.SKILL_READINESS_WEIGHT_PROJECT;
  }
  if (values.SKILL_READINESS_WEIGHT_TOOL !== undefined) {
    weights.tool = values.SKILL_READINESS_WEIGHT_TOOL;
  }
  if (Object.keys(weights).length > 0) {
    config.weights = weights;
  }
  if (values.SKILL_READINESS_STRENGTH_THRESHOLD !== undefined) {
    config.strengthThreshold = values.SKILL_READINESS_STRENGTH_THRESHOLD;
  }
  if (values.SKILL_READINESS_WEAKNESS_THRESHOLD !== undefined) {
    config.weaknessThreshold = values.SKILL_READINESS_WEAKNESS_THRESHOLD;
  }
  if (values.SKILL_READINESS_RECOMMENDATION_COUNT !== undefined) {
    config.recommendationCount = values.SKILL_READINESS_RECOMMENDATION_COUNT;
  }
  if (values.SKILL_READINESS_EXPERIENCE_CEILING_YEARS !== undefined) {
    config.experienceCeilingYears = values.SKILL_READINESS_EXPERIENCE_CEILING_YEARS;
  }
  if (values.SKILL_READINESS_PROJECT_CEILING_COUNT !== undefined) {
    config.projectCeilingCount = values.SKILL_READINESS_PROJECT_CEILING_COUNT;
  }
  return config;
};

const logEnvSchema = z.object({
  SKILL_READINESS_LOG_LEVEL: z
    .enum(["error", "warn", "info", "http", "verbose", "debug", "silly"])
    .default("info"),
  NODE_ENV: z.string().default("development")
});

export interface LoggingConfig {
  level: string;
  silent: boolean;
}

export const loadLoggingConfig = (env: Env = process.env): LoggingConfig => {
  const parsed = logEnvSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ConfigError(`Invalid logging configuration: ${issues.join("; ")}`, issues);
  }
  return {
    level: parsed.data.SKILL_READINESS_LOG_LEVEL,
    silent: parsed.data.NODE_ENV === "test"
  };
};
