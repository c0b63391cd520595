import { describe, expect, it } from "vitest";
import {
  analyzeGap,
  explainReadiness,
  FACTOR_LABELS,
  FACTOR_ORDER,
  InvalidWeightError,
  rankRecommendations,
  SkillGraph,
  toReadinessLevel,
  type FactorName,
  type RoleRequirement,
  type ScoreBreakdown
} from "../src/index";

const options = { strengthThreshold: 70, weaknessThreshold: 50, recommendationCount: 5 };

const breakdown = (scores: Record<FactorName, number>, overallScore: number): ScoreBreakdown => ({
  overallScore,
  factorScores: scores,
  factors: FACTOR_ORDER.map(factor => ({
    factor,
    label: FACTOR_LABELS[factor],
    score: scores[factor],
    weight: 0.25,
    contribution: scores[factor] * 0.25,
    details: ""
  }))
});

const devopsGraph = (): SkillGraph =>
  SkillGraph.from({
    skills: [
      { id: "Linux", category: "Tools", difficulty: 3 },
      { id: "Docker", category: "DevOps", difficulty: 3 },
      { id: "Kubernetes", category: "DevOps", difficulty: 5 },
      { id: "AWS", category: "Cloud", difficulty: 4 },
      { id: "Terraform", category: "DevOps", difficulty: 4 }
    ],
    edges: [
      { skillId: "Docker", prerequisiteId: "Linux", importance: "required" },
      { skillId: "Kubernetes", prerequisiteId: "Docker", importance: "required" },
      { skillId: "AWS", prerequisiteId: "Docker", importance: "required" }
    ]
  });

const devops: RoleRequirement = {
  title: "DevOps Engineer",
  skills: [
    { skillId: "Docker", weight: 1 },
    { skillId: "Kubernetes", weight: 2 },
    { skillId: "Terraform", weight: 1 },
    { skillId: "AWS", weight: 1 }
  ],
  tools: []
};

describe("toReadinessLevel", () => {
  it("maps scores onto level bands", () => {
    expect(toReadinessLevel(100)).toBe("excellent");
    expect(toReadinessLevel(80)).toBe("excellent");
    expect(toReadinessLevel(79.99)).toBe("good");
    expect(toReadinessLevel(60)).toBe("good");
    expect(toReadinessLevel(40)).toBe("moderate");
    expect(toReadinessLevel(39.9)).toBe("developing");
    expect(toReadinessLevel(0)).toBe("developing");
  });
});

describe("rankRecommendations", () => {
  it("ranks missing skills by weight times the skills they unlock", () => {
    const graph = devopsGraph();
    const gap = analyzeGap([], devops, graph);
    const recommendations = rankRecommendations(gap, devops, graph, 5);

    expect(recommendations.map(rec => rec.skillId)).toEqual([
      "Linux",
      "Docker",
      "Kubernetes",
      "AWS",
      "Terraform"
    ]);
    expect(recommendations[0]).toEqual({
      skillId: "Linux",
      rank: 1,
      weight: 2,
      unlocks: 1,
      priority: 4,
      message: "Learn Linux (unlocks 1 skill)"
    });
    expect(recommendations[1].message).toBe("Learn Docker (unlocks 2 skills)");
    expect(recommendations[1].priority).toBe(3);
    expect(recommendations[2].message).toBe("Learn Kubernetes");
    expect(recommendations.map(rec => rec.rank)).toEqual([1, 2, 3, 4, 5]);
  });

  it("truncates to the requested count", () => {
    const graph = devopsGraph();
    const gap = analyzeGap([], devops, graph);

    expect(rankRecommendations(gap, devops, graph, 2).map(rec => rec.skillId)).toEqual([
      "Linux",
      "Docker"
    ]);
    expect(rankRecommendations(gap, devops, graph, 0)).toEqual([]);
  });

  it("uses the same role weight checks as scoring", () => {
    const graph = devopsGraph();
    const repeated: RoleRequirement = {
      title: "DevOps Engineer",
      skills: [
        { skillId: "Docker", weight: 5 },
        { skillId: "AWS", weight: 1 },
        { skillId: "Docker", weight: 1 }
      ],
      tools: []
    };
    const gap = analyzeGap(["AWS"], repeated, graph);

    expect(() => rankRecommendations(gap, repeated, graph, 5)).toThrow(InvalidWeightError);
  });

  it("scores skills missing from the catalog without unlocks", () => {
    const graph = devopsGraph();
    const role: RoleRequirement = {
      title: "Platform",
      skills: [{ skillId: "Nomad", weight: 3 }],
      tools: []
    };
    const gap = analyzeGap([], role, graph);

    expect(rankRecommendations(gap, role, graph, 5)).toEqual([
      { skillId: "Nomad", rank: 1, weight: 3, unlocks: 0, priority: 3, message: "Learn Nomad" }
    ]);
  });
});

describe("explainReadiness", () => {
  it("classifies strengths and weaknesses and writes a summary", () => {
    const graph = devopsGraph();
    const gap = analyzeGap(["Docker", "Linux"], devops, graph);
    const explanation = explainReadiness(
      breakdown({ technical: 40, experience: 100, project: 85, tool: 60 }, 66),
      gap,
      devops,
      graph,
      options
    );

    expect(explanation.readinessLevel).toBe("good");
    expect(explanation.strengths).toEqual(["experience", "project"]);
    expect(explanation.weaknesses).toEqual(["technical"]);
    expect(explanation.advice).toEqual([
      "Close the required skill gaps first, starting with the top recommendations"
    ]);
    expect(explanation.summary).toBe(
      "Readiness for DevOps Engineer is good at 66.0%. Strong areas: Experience, Project Portfolio. Areas for improvement: Technical Skills."
    );
    expect(explanation.recommendations.map(rec => rec.skillId)).toEqual([
      "Kubernetes",
      "AWS",
      "Terraform"
    ]);
  });

  it("orders ties in canonical factor order and weaknesses by ascending score", () => {
    const graph = devopsGraph();
    const gap = analyzeGap([], devops, graph);

    const tied = explainReadiness(
      breakdown({ technical: 80, experience: 80, project: 10, tool: 30 }, 50),
      gap,
      devops,
      graph,
      options
    );
    expect(tied.strengths).toEqual(["technical", "experience"]);
    expect(tied.weaknesses).toEqual(["project", "tool"]);

    const reversed = explainReadiness(
      breakdown({ technical: 30, experience: 90, project: 95, tool: 10 }, 50),
      gap,
      devops,
      graph,
      options
    );
    expect(reversed.strengths).toEqual(["project", "experience"]);
    expect(reversed.weaknesses).toEqual(["tool", "technical"]);
  });

  it("returns empty lists and default advice when nothing stands out", () => {
    const graph = devopsGraph();
    const role: RoleRequirement = { title: "Generalist", skills: [], tools: [] };
    const gap = analyzeGap([], role, graph);
    const explanation = explainReadiness(
      breakdown({ technical: 60, experience: 60, project: 60, tool: 60 }, 60),
      gap,
      role,
      graph,
      options
    );

    expect(explanation.strengths).toEqual([]);
    expect(explanation.weaknesses).toEqual([]);
    expect(explanation.recommendations).toEqual([]);
    expect(explanation.advice).toEqual(["Continue building on your strong foundation"]);
    expect(explanation.summary).toBe("Readiness for Generalist is good at 60.0%.");
  });
});
