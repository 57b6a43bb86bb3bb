import { z } from "zod";

export const personnelStatusSchema = z.enum(["ACTIVE", "WOUNDED", "ON_LEAVE", "MIA", "KIA", "RETIRED"]);

export const characterRecordSchema = z.object({
  id: z
    .string()
    .min(1)
    .refine((id) => !id.includes("::"), "character ids may not contain '::'"),
  name: z.string().min(1),
  callsign: z.string().optional(),
  profession: z.string().min(1),
  secondaryProfession: z.string().optional(),
  rank: z.string().optional(),
  status: personnelStatusSchema,
  age: z.number().int().min(0),
  unit: z.string().optional(),
  skills: z.record(z.number().int().min(0)).default({}),
  attributes: z.record(z.number().int()).default({}),
});

export const unitSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  parentId: z.string().optional(),
});

export const rosterSeedSchema = z
  .object({
    units: z.array(unitSchema).default([]),
    characters: z.array(characterRecordSchema),
  })
  .superRefine((seed, ctx) => {
    const unitIds = new Set(seed.units.map((u) => u.id));
    const seen = new Set<string>();
    seed.characters.forEach((c, i) => {
      if (seen.has(c.id)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["characters", i, "id"], message: `duplicate id '${c.id}'` });
      }
      seen.add(c.id);
      if (c.unit !== undefined && !unitIds.has(c.unit)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["characters", i, "unit"], message: `unknown unit '${c.unit}'` });
      }
    });
  });
