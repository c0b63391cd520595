import { describe, expect, it, vi } from "vitest";
import { CatalogFormatError, getLogger } from "@skill-readiness/core";
import { loadCatalogFromCsv, parseProfilesCsv, parseRolesCsv, readCsv } from "../src/index";

const skillsCsv = [
  "id,category,difficulty,label,weeks",
  "Linux,Tools,3,,",
  "Docker,DevOps,3,,",
  "Kubernetes,DevOps,5,K8s,6"
].join("\n");

const prerequisitesCsv = [
  "skill,prerequisite,importance",
  "Docker,Linux,required",
  "Kubernetes,Docker,"
].join("\n");

describe("loadCatalogFromCsv", () => {
  it("builds the graph and collects durations", () => {
    const { graph, durations } = loadCatalogFromCsv({ skillsCsv, prerequisitesCsv });

    expect(graph.size).toBe(3);
    expect(graph.getSkill("Kubernetes")).toEqual({
      id: "Kubernetes",
      category: "DevOps",
      difficulty: 5,
      label: "K8s"
    });
    expect(graph.edges()).toEqual([
      { skillId: "Docker", prerequisiteId: "Linux", importance: "required" },
      { skillId: "Kubernetes", prerequisiteId: "Docker", importance: "required" }
    ]);
    expect(durations).toEqual({ Kubernetes: 6 });
  });

  it("works without a prerequisites file", () => {
    expect(loadCatalogFromCsv({ skillsCsv }).graph.edges()).toEqual([]);
  });

  it("rejects non-numeric cells", () => {
    const broken = ["id,category,difficulty,label,weeks", "Linux,Tools,hard,,"].join("\n");

    expect(() => loadCatalogFromCsv({ skillsCsv: broken })).toThrow(
      "skills CSV row 2: difficulty must be numeric"
    );
  });

  it("rejects rows with missing fields and logs the rejection", () => {
    const spy = vi.spyOn(getLogger(), "log");
    const short = ["id,category,difficulty,label,weeks", "Linux,Tools"].join("\n");

    expect(() => readCsv(short, "skills CSV")).toThrow(CatalogFormatError);
    expect(spy).toHaveBeenCalledWith(
      "error",
      expect.stringMatching(/^Rejected CSV input: skills CSV: /),
      expect.objectContaining({ module: "catalog-csv", name: "CatalogFormatError" })
    );
    spy.mockRestore();
  });
});

describe("parseRolesCsv", () => {
  it("groups rows by role in first-seen order", () => {
    const csv = [
      "role,skill,weight,tool",
      "DevOps Engineer,Docker,2,",
      "Data Engineer,SQL,,",
      "DevOps Engineer,Linux,1,Git",
      "DevOps Engineer,,,Grafana"
    ].join("\n");

    expect(parseRolesCsv(csv)).toEqual([
      {
        title: "DevOps Engineer",
        skills: [
          { skillId: "Docker", weight: 2 },
          { skillId: "Linux", weight: 1 }
        ],
        tools: ["Git", "Grafana"]
      },
      { title: "Data Engineer", skills: [{ skillId: "SQL", weight: 1 }], tools: [] }
    ]);
  });
});

describe("parseProfilesCsv", () => {
  it("splits semicolon lists", () => {
    const csv = [
      "id,yearsOfExperience,projectCount,skills,tools",
      "c-1,2,4,Python; SQL,Git;Jupyter",
      "c-2,,,,"
    ].join("\n");

    expect(parseProfilesCsv(csv)).toEqual([
      { id: "c-1", skills: ["Python", "SQL"], yearsOfExperience: 2, projectCount: 4, tools: ["Git", "Jupyter"] },
      { id: "c-2", skills: [], yearsOfExperience: 0, projectCount: 0, tools: [] }
    ]);
  });
});
