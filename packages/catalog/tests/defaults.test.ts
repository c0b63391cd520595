import { describe, expect, it } from "vitest";
import { ReadinessEngine, ReadinessService } from "@skill-readiness/core";
import { loadDefaultCatalog, loadSampleProfileList, loadSampleProfiles } from "../src/index";

describe("bundled catalog", () => {
  it("loads skills, roles and durations", () => {
    const { graph, roles, durations } = loadDefaultCatalog();

    expect(graph.size).toBe(53);
    expect(roles.listRoles()).toEqual([
      "Data Engineer",
      "Software Engineer",
      "Full Stack Developer",
      "Machine Learning Engineer",
      "DevOps Engineer"
    ]);
    expect(graph.prerequisitesOf("Kubernetes", true)).toEqual(new Set(["Docker", "Linux"]));
    expect(durations.Kubernetes).toBe(6);
  });

  it("only references catalog skills from its roles", () => {
    const { graph, roles } = loadDefaultCatalog();

    roles.listRoles().forEach(title => {
      roles.getRole(title)?.skills.forEach(({ skillId }) => {
        expect(graph.hasSkill(skillId)).toBe(true);
      });
    });
  });

  it("assesses the sample student for the data engineer role", () => {
    const { graph, roles } = loadDefaultCatalog();
    const service = new ReadinessService(new ReadinessEngine(graph, roles), loadSampleProfiles());

    const result = service.assessCandidate("sample-data-student", "Data Engineer");

    expect(result.factorScores.technical).toBe(23.53);
    expect(result.matchedSkills).toEqual(["Python", "SQL"]);
    expect(result.extraSkills).toEqual(["Git", "Pandas"]);
    expect(result.recommendations).toHaveLength(5);
    expect(loadSampleProfileList().map(profile => profile.id)).toEqual([
      "sample-data-student",
      "sample-web-graduate"
    ]);
  });
});
