import type { ReadinessLevel } from "./domain/models";

export interface ScoringWeights {
  technical: number;
  experience: number;
  project: number;
  tool: number;
}

export interface EngineConfig {
  weights: ScoringWeights;
  strengthThreshold: number;
  weaknessThreshold: number;
  recommendationCount: number;
  experienceCeilingYears: number;
  projectCeilingCount: number;
}

export const DEFAULT_WEIGHTS: Readonly<ScoringWeights> = Object.freeze({
  technical: 0.4,
  experience: 0.25,
  project: 0.2,
  tool: 0.15
});

export const DEFAULT_ENGINE_CONFIG: Readonly<EngineConfig> = Object.freeze({
  weights: DEFAULT_WEIGHTS,
  strengthThreshold: 70,
  weaknessThreshold: 50,
  recommendationCount: 5,
  experienceCeilingYears: 2,
  projectCeilingCount: 3
});

// Tier assumed for skills the catalog does not know.
export const DEFAULT_DIFFICULTY = 3;

export const READINESS_LEVEL_BANDS: ReadonlyArray<[number, ReadinessLevel]> = [
  [80, "excellent"],
  [60, "good"],
  [40, "moderate"]
];
