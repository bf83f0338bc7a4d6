import type { z } from "zod";
import { IssueCollection } from "../issues/collection.js";
import type {
  Issue,
  IssueApprovals,
  IssuePlanning,
  IssueReadiness,
} from "../types.js";
import type { CustomField, FieldMap } from "./fields.js";
import {
  optionListSchema,
  storyPointsFieldSchema,
  textFieldSchema,
  userFieldSchema,
  type RawIssue,
} from "./schemas.js";

/** Matches "Delivery Owner: [~jdoe]" anywhere in a description. */
export const DELIVERY_OWNER_RE = /\W*(Delivery Owner|DELIVERY OWNER)\W*:\W*\[~([a-zA-Z0-9]*)\]/;

function approvalsFrom(values: ReadonlySet<string>): IssueApprovals {
  return {
    development: values.has("devel_ack"),
    product: values.has("pm_ack"),
    quality: values.has("qa_ack"),
    experience: values.has("ux_ack"),
    documentation: values.has("doc_ack"),
  };
}

function readinessFrom(values: ReadonlySet<string>): IssueReadiness {
  return {
    development: values.has("dev_ready"),
    product: values.has("pm_ready"),
    quality: values.has("qe_ready"),
    experience: values.has("ux_ready"),
    documentation: values.has("doc_ready"),
    support: values.has("support_ready"),
  };
}

function planningFrom(values: ReadonlySet<string>): IssuePlanning {
  return {
    noFeature: values.has("no_feature"),
    noQuality: values.has("no_qe"),
    noDocumentation: values.has("no_doc"),
  };
}

export interface MapperContext {
  fieldMap: FieldMap;
  /** Instance URL ending in "/". */
  baseUrl: string;
}

function customValue<S extends z.ZodTypeAny>(
  raw: RawIssue,
  ctx: MapperContext,
  field: CustomField,
  schema: S,
): z.infer<S> {
  const id = ctx.fieldMap[field];
  return schema.parse(id === undefined ? undefined : raw.fields[id]);
}

export function deliveryOwner(description: string, assignee: string): string {
  const match = DELIVERY_OWNER_RE.exec(description);
  return match ? match[2] : assignee;
}

export function issueLink(baseUrl: string, key: string): string {
  return `${baseUrl}browse/${key}`;
}

/** Decode a validated search result into an Issue with no linked issues yet. */
export function toIssue(raw: RawIssue, ctx: MapperContext): Issue {
  const f = raw.fields;
  const description = f.description ?? "";

  const approvals = customValue(raw, ctx, "approvals", optionListSchema);
  const readiness = customValue(raw, ctx, "readiness", optionListSchema);
  const planning = customValue(raw, ctx, "planning", optionListSchema);
  const flagged = customValue(raw, ctx, "flagged", optionListSchema);

  return {
    key: raw.key,
    project: f.project.key,
    link: issueLink(ctx.baseUrl, raw.key),
    summary: f.summary,
    description,
    type: f.issuetype.name,
    status: f.status.name,
    priority: f.priority?.name ?? "",
    resolution: f.resolution?.name ?? "",
    components: f.components.map((c) => c.name),
    fixVersions: f.fixVersions.map((v) => v.name),
    comments: (f.comment?.comments ?? []).map((c) => ({
      body: c.body,
      created: c.created,
      updated: c.updated.date,
      utcOffset: c.updated.utcOffset,
    })),
    storyPoints: customValue(raw, ctx, "storyPoints", storyPointsFieldSchema),
    owner: deliveryOwner(description, f.assignee?.name ?? ""),
    qeAssignee: customValue(raw, ctx, "qeAssignee", userFieldSchema),
    acceptance: customValue(raw, ctx, "acceptance", textFieldSchema),
    designDoc: customValue(raw, ctx, "designDoc", textFieldSchema),
    readiness: readinessFrom(readiness),
    planning: planningFrom(planning),
    approvals: approvalsFrom(approvals),
    impediment: flagged.has("Impediment"),
    parentLink: customValue(raw, ctx, "parentLink", textFieldSchema),
    epicLink: customValue(raw, ctx, "epicLink", textFieldSchema),
    marketProblem: null,
    linkedIssues: new IssueCollection(),
  };
}
