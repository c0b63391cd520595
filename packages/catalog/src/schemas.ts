import { z } from "zod";

const id = z.string().trim().min(1);

export const skillRecordSchema = z.object({
  id,
  category: z.string().trim().min(1).default("General"),
  difficulty: z.number().int().positive(),
  label: z.string().optional()
});

export const prerequisiteRecordSchema = z.object({
  skill: id,
  prerequisite: id,
  importance: z.enum(["required", "recommended"]).default("required")
});

export const catalogDocumentSchema = z.object({
  skills: z.array(skillRecordSchema),
  prerequisites: z.array(prerequisiteRecordSchema).default([]),
  durations: z.record(z.string(), z.number().positive()).default({})
});

export const roleDocumentSchema = z.object({
  title: id,
  skills: z
    .array(
      z.object({
        skill: id,
        weight: z.number().positive().finite().default(1)
      })
    )
    .default([])
    .superRefine((skills, ctx) => {
      const seen = new Set<string>();
      skills.forEach((entry, index) => {
        if (seen.has(entry.skill)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Skill "${entry.skill}" is listed more than once`,
            path: [index, "skill"]
          });
        }
        seen.add(entry.skill);
      });
    }),
  tools: z.array(id).default([])
});

export const profileDocumentSchema = z.object({
  id,
  skills: z.array(id).default([]),
  yearsOfExperience: z.number().int().nonnegative().default(0),
  projectCount: z.number().int().nonnegative().default(0),
  tools: z.array(id).default([])
});

export type CatalogDocument = z.infer<typeof catalogDocumentSchema>;
export type RoleDocument = z.infer<typeof roleDocumentSchema>;
export type ProfileDocument = z.infer<typeof profileDocumentSchema>;
