import { z } from "zod";

export const componentsFilterSchema = z.object({
  include: z.array(z.string()).default([]),
  exclude: z.array(z.string()).default([]),
});

export const searchProfileSchema = z.object({
  id: z.string().min(1),
  jql: z.string().min(1),
  components: componentsFilterSchema.default({ include: [], exclude: [] }),
});

export const readinessConfigSchema = z
  .object({
    instance: z.object({
      url: z.string().url(),
    }),
    profiles: z.array(searchProfileSchema).default([]),
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.profiles.forEach((p, i) => {
      if (seen.has(p.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["profiles", i, "id"],
          message: `Duplicate profile id "${p.id}"`,
        });
      }
      seen.add(p.id);
    });
  });
