export type PrerequisiteImportance = "required" | "recommended";

export type FactorName = "technical" | "experience" | "project" | "tool";

export type ReadinessLevel = "excellent" | "good" | "moderate" | "developing";

export interface Skill {
  id: string;
  category: string;
  difficulty: number; // intrinsic tier, 1 = easiest
  label?: string;
}

export interface PrerequisiteEdge {
  skillId: string;
  prerequisiteId: string;
  importance: PrerequisiteImportance;
}

export interface RoleSkill {
  skillId: string;
  weight: number;
}

export interface RoleRequirement {
  title: string;
  skills: RoleSkill[];
  tools: string[];
}

export interface CandidateProfile {
  id?: string;
  skills: string[];
  yearsOfExperience: number;
  projectCount: number;
  tools: string[];
}

export interface TransitiveGap {
  skillId: string;
  importance: PrerequisiteImportance;
  introducedBy: string[]; // role skills whose prerequisite closure reached this one
}

export interface GapReport {
  roleTitle: string;
  matched: string[];
  missingRequired: string[];
  missingRecommended: string[];
  directlyMissing: string[];
  transitivelyMissing: TransitiveGap[];
  extraSkills: string[];
  unknownSkills: string[];
}

export interface FactorScore {
  factor: FactorName;
  label: string;
  score: number;
  weight: number; // normalized share of the overall score
  contribution: number;
  details: string;
}

export interface ScoreBreakdown {
  overallScore: number;
  factors: FactorScore[];
  factorScores: Record<FactorName, number>;
}

export interface SkillRecommendation {
  skillId: string;
  rank: number;
  weight: number;
  unlocks: number;
  priority: number;
  message: string;
}

export interface Explanation {
  readinessLevel: ReadinessLevel;
  strengths: FactorName[];
  weaknesses: FactorName[];
  recommendations: SkillRecommendation[];
  advice: string[];
  summary: string;
}

export interface ReadinessResult {
  roleTitle: string;
  overallScore: number;
  readinessLevel: ReadinessLevel;
  factorScores: Record<FactorName, number>;
  factors: FactorScore[];
  matchedSkills: string[];
  missingSkills: {
    required: string[];
    recommended: string[];
  };
  extraSkills: string[];
  strengths: FactorName[];
  weaknesses: FactorName[];
  recommendations: SkillRecommendation[];
  advice: string[];
  summary: string;
}

export interface LearningStep {
  skillId: string;
  position: number;
  estimatedWeeks: number;
  difficulty: number;
  category: string;
  importance: PrerequisiteImportance;
  unmetPrerequisites: string[];
  satisfiedPrerequisites: string[];
  deferredPrerequisites: string[];
}

export interface LearningPath {
  target: string;
  steps: LearningStep[];
  totalWeeks: number;
}

export const FACTOR_ORDER: readonly FactorName[] = [
  "technical",
  "experience",
  "project",
  "tool"
];

export const FACTOR_LABELS: Readonly<Record<FactorName, string>> = {
  technical: "Technical Skills",
  experience: "Experience",
  project: "Project Portfolio",
  tool: "Tool Proficiency"
};
