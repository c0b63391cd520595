import { ReadinessEngine, ReadinessService, createModuleLogger, loadEngineConfigFromEnv } from "../packages/core/src/index";
import { loadDefaultCatalog, loadSampleProfiles } from "../packages/catalog/src/index";

const log = createModuleLogger("demo");

const run = (): void => {
  const { graph, roles, durations } = loadDefaultCatalog();
  const engine = new ReadinessEngine(graph, roles, loadEngineConfigFromEnv());
  const service = new ReadinessService(engine, loadSampleProfiles());

  const candidateId = process.argv[2] ?? "sample-data-student";
  const roleTitle = process.argv[3] ?? "Data Engineer";

  const result = service.assessCandidate(candidateId, roleTitle);
  console.log(result.summary);
  console.log("Factors:");
  result.factors.forEach(factor => {
    console.log(`  ${factor.label.padEnd(18)} ${factor.score.toFixed(1).padStart(6)}  ${factor.details}`);
  });
  console.log("Missing (required):", result.missingSkills.required.join(", ") || "none");
  console.log("Missing (recommended):", result.missingSkills.recommended.join(", ") || "none");
  console.log("Recommendations:");
  result.recommendations.forEach(rec => console.log(`  ${rec.rank}. ${rec.message}`));

  const path = service.planForCandidate(candidateId, roleTitle, {
    includeRecommended: true,
    durations
  });
  console.log(`\nLearning path (${path.totalWeeks} weeks):`);
  path.steps.forEach(step => {
    console.log(
      `  ${step.position}. ${step.skillId} [tier ${step.difficulty}, ${step.estimatedWeeks}w, ${step.importance}]`
    );
  });
};

try {
  run();
} catch (error) {
  log.logError(error instanceof Error ? error : new Error(String(error)), "Demo run failed");
  process.exitCode = 1;
}
