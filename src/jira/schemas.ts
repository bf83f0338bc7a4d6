import { z } from "zod";
import { ISSUE_TYPES } from "../types.js";

const OFFSET_RE = /([+-])(\d{2}):?(\d{2})$/;

/** Offset of a timestamp from UTC in minutes, 0 when it carries none. */
export function utcOffsetMinutes(value: string): number {
  const match = OFFSET_RE.exec(value);
  if (!match) return 0;
  const minutes = Number(match[2]) * 60 + Number(match[3]);
  return match[1] === "-" ? -minutes : minutes;
}

function parseTrackerDate(value: string): Date | null {
  const date = new Date(value.replace(/([+-]\d{2})(\d{2})$/, "$1:$2"));
  return Number.isNaN(date.getTime()) ? null : date;
}

/** Tracker timestamps look like 2024-03-01T09:30:00.000+0000 (no colon in the offset). */
export const trackerDateSchema = z
  .string()
  .transform((value, ctx) => {
    const date = parseTrackerDate(value);
    if (date === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid date: ${value}` });
      return z.NEVER;
    }
    return date;
  });

/** A tracker timestamp that keeps the offset it was written with. */
export const trackerTimestampSchema = z
  .string()
  .transform((value, ctx) => {
    const date = parseTrackerDate(value);
    if (date === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid date: ${value}` });
      return z.NEVER;
    }
    return { date, utcOffset: utcOffsetMinutes(value) };
  });

const namedSchema = z.object({ name: z.string() });

export const fieldDescriptorSchema = z.object({
  id: z.string(),
  name: z.string(),
});
export const fieldListSchema = z.array(fieldDescriptorSchema);
export type FieldDescriptor = z.infer<typeof fieldDescriptorSchema>;

export const rawCommentSchema = z.object({
  body: z.string().default(""),
  created: trackerDateSchema,
  updated: trackerTimestampSchema,
});

/** Standard fields. Custom fields pass through untouched and are decoded by id. */
export const rawIssueFieldsSchema = z
  .object({
    summary: z.string().default(""),
    description: z.string().nullish(),
    issuetype: z.object({ name: z.enum(ISSUE_TYPES) }),
    status: namedSchema,
    priority: namedSchema.nullish(),
    resolution: namedSchema.nullish(),
    project: z.object({ key: z.string() }),
    components: z.array(namedSchema).default([]),
    fixVersions: z.array(namedSchema).default([]),
    assignee: z.object({ name: z.string() }).nullish(),
    comment: z
      .object({ comments: z.array(rawCommentSchema).default([]) })
      .nullish(),
  })
  .passthrough();

export const rawIssueSchema = z.object({
  key: z.string().min(1),
  fields: rawIssueFieldsSchema,
});
export type RawIssue = z.infer<typeof rawIssueSchema>;

export const searchPageSchema = z.object({
  startAt: z.number().int().nonnegative().optional(),
  total: z.number().int().nonnegative().optional(),
  issues: z.array(rawIssueSchema),
});

export const projectSchema = z.object({
  key: z.string(),
  components: z.array(namedSchema).default([]),
});

// ── Custom field values ──────────────────────────────────────────────

/** Checkbox / multi-select values: [{ value: "devel_ack" }, ...] */
export const optionListSchema = z
  .array(z.object({ value: z.string() }))
  .nullish()
  .transform((options) => new Set((options ?? []).map((o) => o.value)));

export const textFieldSchema = z
  .string()
  .nullish()
  .transform((value) => value ?? "");

/** Story points are whole numbers; fractions are dropped. */
export const storyPointsFieldSchema = z
  .number()
  .nonnegative()
  .nullish()
  .transform((value) => (value === null || value === undefined ? null : Math.trunc(value)));

export const userFieldSchema = z
  .object({ key: z.string() })
  .nullish()
  .transform((user) => user?.key ?? "");
