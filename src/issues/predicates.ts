import {
  ACTIVE_STATUSES,
  IssueStatus,
  PRIORITY_UNPRIORITIZED,
  RESOLUTION_DONE,
  type Issue,
  type IssueType,
} from "../types.js";

/** A test over a single issue. Compose with `and`, `or` and `not`. */
export type IssuePredicate = (issue: Issue) => boolean;

// ── Combinators ──────────────────────────────────────────────────────

export function and(...predicates: IssuePredicate[]): IssuePredicate {
  return (issue) => predicates.every((p) => p(issue));
}

export function or(...predicates: IssuePredicate[]): IssuePredicate {
  return (issue) => predicates.some((p) => p(issue));
}

export function not(predicate: IssuePredicate): IssuePredicate {
  return (issue) => !predicate(issue);
}

// ── Status ───────────────────────────────────────────────────────────

export function inStatus(status: string): IssuePredicate {
  return (issue) => issue.status === status;
}

export const isDone: IssuePredicate = inStatus(IssueStatus.Done);

export const isObsolete: IssuePredicate = inStatus(IssueStatus.Obsolete);

/** Someone is working on it right now. */
export const isActive: IssuePredicate = (issue) =>
  ACTIVE_STATUSES.includes(issue.status);

/** Resolution is "Done". Status alone does not make an issue resolved. */
export const isResolved: IssuePredicate = (issue) =>
  issue.resolution === RESOLUTION_DONE;

export const isPrioritized: IssuePredicate = (issue) =>
  issue.priority !== "" && issue.priority !== PRIORITY_UNPRIORITIZED;

// ── Shape ────────────────────────────────────────────────────────────

export function isType(...types: IssueType[]): IssuePredicate {
  return (issue) => types.includes(issue.type);
}

export function hasComponent(component: string): IssuePredicate {
  return (issue) => issue.components.includes(component);
}

export function inProject(project: string): IssuePredicate {
  return (issue) => issue.project === project;
}

export function hasStoryPoints(
  issue: Issue,
): issue is Issue & { readonly storyPoints: number } {
  return issue.storyPoints !== null;
}

export const hasNoComponents: IssuePredicate = (issue) =>
  issue.components.length === 0;

export const isImpeded: IssuePredicate = (issue) => issue.impediment;
