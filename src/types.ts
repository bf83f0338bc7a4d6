import type { IssueCollection } from "./issues/collection.js";

/** Issue types the report knows how to evaluate */
export const ISSUE_TYPES = ["Initiative", "Epic", "Story", "Task", "Bug"] as const;
export type IssueType = (typeof ISSUE_TYPES)[number];

/** Status names with a meaning for the checks. Any other status is just a name. */
export const IssueStatus = {
  Done: "Done",
  Obsolete: "Obsolete",
  InProgress: "In Progress",
  FeatureComplete: "Feature Complete",
  CodeReview: "Code Review",
  QEReview: "QE Review",
} as const;

/** Statuses that count as work being actively done */
export const ACTIVE_STATUSES: readonly string[] = [
  IssueStatus.InProgress,
  IssueStatus.FeatureComplete,
  IssueStatus.CodeReview,
  IssueStatus.QEReview,
];

export const RESOLUTION_DONE = "Done";
export const PRIORITY_UNPRIORITIZED = "Unprioritized";

/** A comment on an issue, dates already parsed */
export interface IssueComment {
  body: string;
  created: Date;
  updated: Date;
  /** Minutes east of UTC that `updated` was reported in. */
  utcOffset: number;
}

/** Per-discipline 5-acks approvals */
export interface IssueApprovals {
  development: boolean;
  product: boolean;
  quality: boolean;
  experience: boolean;
  documentation: boolean;
}

/** Per-discipline grooming sign-offs */
export interface IssueReadiness {
  development: boolean;
  product: boolean;
  quality: boolean;
  experience: boolean;
  documentation: boolean;
  support: boolean;
}

/** Planning exemptions: work the epic explicitly does not need */
export interface IssuePlanning {
  noFeature: boolean;
  noQuality: boolean;
  noDocumentation: boolean;
}

/**
 * A fully resolved tracker issue. Linked issues and the market problem are
 * fetched before the issue reaches the analysis, never lazily.
 */
export interface Issue {
  readonly key: string;
  /** Project key, e.g. "DEMO" for DEMO-12. */
  readonly project: string;
  /** Browser URL of the issue. */
  readonly link: string;
  readonly summary: string;
  readonly description: string;
  readonly type: IssueType;
  readonly status: string;
  /** Empty when no priority is set. */
  readonly priority: string;
  /** Empty when unresolved. */
  readonly resolution: string;
  readonly components: readonly string[];
  readonly fixVersions: readonly string[];
  /** Oldest first, as the tracker returns them. */
  readonly comments: readonly IssueComment[];
  /** `null` when nobody estimated the issue. */
  readonly storyPoints: number | null;
  /** Delivery owner username, empty when unknown. */
  readonly owner: string;
  readonly qeAssignee: string;
  readonly acceptance: string;
  readonly designDoc: string;
  readonly readiness: Readonly<IssueReadiness>;
  readonly planning: Readonly<IssuePlanning>;
  readonly approvals: Readonly<IssueApprovals>;
  readonly impediment: boolean;
  /** Key of the parent initiative, empty when unset. */
  readonly parentLink: string;
  /** Key of the owning epic, empty when unset. */
  readonly epicLink: string;
  readonly marketProblem: Issue | null;
  readonly linkedIssues: IssueCollection;
}

/** Completion counters. `unknown` items are never part of `total`. */
export interface Progress {
  completed: number;
  total: number;
  unknown: number;
}

/** Search profile from the configuration file */
export interface SearchProfile {
  id: string;
  jql: string;
  components: {
    include: string[];
    exclude: string[];
  };
}

/** Configuration file: one tracker instance, many search profiles */
export interface ReadinessConfig {
  instance: {
    url: string;
  };
  profiles: SearchProfile[];
}
