import Papa from "papaparse";
import {
  ConfigError,
  resolveEngineConfig,
  type EngineConfig,
  type EngineConfigInput,
  type ScoringWeights
} from "@skill-readiness/core";

const normalizeToken = (value: string): string =>
  value.toLowerCase().replace(/[^a-z0-9]/g, "");

const parseNumericCell = (value: string, label: string, row: number): number => {
  const numeric = Number.parseFloat(value);
  if (!Number.isFinite(numeric)) {
    throw new ConfigError(`${label} on row ${row} must be numeric.`);
  }
  return numeric;
};

/**
 * Reads `category,key,value` rows into a partial engine configuration:
 * weights/{technical,experience,project,tool}, thresholds/{strength,weakness},
 * recommendations/count, ceilings/{experience,project}.
 */
export const parseEngineConfigCsv = (csvText: string): EngineConfigInput => {
  const rows = Papa.parse<string[]>(csvText.trim(), { skipEmptyLines: "greedy" }).data;
  if (rows.length === 0) {
    throw new ConfigError("Config CSV is empty.");
  }

  const [headerRaw, ...dataRows] = rows;
  const header = headerRaw.map(cell => normalizeToken(cell));
  if (header[0] !== "category" || header[1] !== "key" || header[2] !== "value") {
    throw new ConfigError(
      'Config CSV header must start with "category,key,value" (case insensitive).'
    );
  }

  const weights: Partial<ScoringWeights> = {};
  const config: EngineConfigInput = {};

  dataRows.forEach((row, index) => {
    const rowNumber = index + 2;
    if (row.length < 3) {
      throw new ConfigError(`Config CSV row ${rowNumber} must include category,key,value.`);
    }
    const [rawCategory, rawKey, rawValue] = row;
    const category = normalizeToken(rawCategory);
    const key = normalizeToken(rawKey);
    const value = rawValue.trim();

    switch (category) {
      case "weights":
        switch (key) {
          case "technical":
          case "experience":
          case "project":
          case "tool":
            weights[key] = parseNumericCell(value, `Weight (${key})`, rowNumber);
            break;
          default:
            throw new ConfigError(`Unknown weight key "${rawKey}" on row ${rowNumber}.`);
        }
        break;
      case "thresholds":
        if (key === "strength") {
          config.strengthThreshold = parseNumericCell(value, "Strength threshold", rowNumber);
        } else if (key === "weakness") {
          config.weaknessThreshold = parseNumericCell(value, "Weakness threshold", rowNumber);
        } else {
          throw new ConfigError(`Unknown threshold key "${rawKey}" on row ${rowNumber}.`);
        }
        break;
      case "recommendations":
        if (key !== "count") {
          throw new ConfigError(`Unknown recommendations key "${rawKey}" on row ${rowNumber}.`);
        }
        config.recommendationCount = parseNumericCell(value, "Recommendation count", rowNumber);
        break;
      case "ceilings":
        if (key === "experience" || key === "experienceyears") {
          config.experienceCeilingYears = parseNumericCell(value, "Experience ceiling", rowNumber);
        } else if (key === "project" || key === "projectcount") {
          config.projectCeilingCount = parseNumericCell(value, "Project ceiling", rowNumber);
        } else {
          throw new ConfigError(`Unknown ceiling key "${rawKey}" on row ${rowNumber}.`);
        }
        break;
      default:
        throw new ConfigError(`Unknown config category "${rawCategory}" on row ${rowNumber}.`);
    }
  });

  if (Object.keys(weights).length > 0) {
    config.weights = weights;
  }
  return config;
};

export const loadEngineConfigCsv = (csvText: string, base?: EngineConfig): EngineConfig =>
  resolveEngineConfig(parseEngineConfigCsv(csvText), base);
