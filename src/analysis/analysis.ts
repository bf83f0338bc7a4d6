import { IssueCollection } from "../issues/collection.js";
import {
  and,
  hasComponent,
  hasNoComponents,
  inProject,
  isObsolete,
  isType,
  not,
} from "../issues/predicates.js";
import type { Issue, IssueComment, Progress } from "../types.js";
import { compareStatus, type CheckStatus } from "./result.js";

/** Derived metrics for one issue, optionally scoped to a single component. */
export interface IssueAnalysis {
  readonly issue: Issue;
  /** Component the linked issues were scoped to, if any. */
  readonly component: string | undefined;
  /** Non-obsolete linked issues, whatever their component. */
  readonly allLinked: IssueCollection;
  /** `allLinked` narrowed to `component` when one was given. */
  readonly scoped: IssueCollection;
  readonly issuesCompletion: Readonly<Progress>;
  readonly pointsCompletion: Readonly<Progress>;
  /** Stories, tasks and bugs in scope. */
  readonly numActivities: number;
  /** Some linked issue of the same project has no component. */
  readonly issueNoComponent: boolean;
  readonly commentStatus: CheckStatus;
  /** Last update of the comment that set `commentStatus`, null when NONE. */
  readonly commentDate: Date | null;
  /** UTC offset, in minutes, `commentDate` was written in. */
  readonly commentUtcOffset: number;
}

export interface CommentSignal {
  status: CheckStatus;
  date: Date | null;
  utcOffset: number;
}

const NO_SIGNAL: CommentSignal = { status: "NONE", date: null, utcOffset: 0 };

const STATUS_PREFIXES: ReadonlyArray<[prefix: string, status: CheckStatus]> = [
  ["GREEN:", "GREEN"],
  ["YELLOW:", "YELLOW"],
  ["RED:", "RED"],
];

function commentSignal(comment: IssueComment): CheckStatus | null {
  for (const [prefix, status] of STATUS_PREFIXES) {
    if (comment.body.startsWith(prefix)) return status;
  }
  return null;
}

/**
 * Status asserted by the most recent comment starting with "GREEN:",
 * "YELLOW:" or "RED:". Older status comments are superseded, not merged.
 */
export function getIssueCommentStatus(issue: Issue): CommentSignal {
  for (let j = issue.comments.length - 1; j >= 0; j--) {
    const comment = issue.comments[j];
    const status = commentSignal(comment);
    if (status !== null) {
      return { status, date: comment.updated, utcOffset: comment.utcOffset };
    }
  }
  return NO_SIGNAL;
}

/** Most severe comment signal across issues; the first one wins a tie. */
function strongestCommentStatus(issues: Iterable<Issue>): CommentSignal {
  let best = NO_SIGNAL;
  for (const issue of issues) {
    const signal = getIssueCommentStatus(issue);
    if (compareStatus(signal.status, best.status) > 0) {
      best = signal;
    }
  }
  return best;
}

function normalizeComponent(component: string | undefined): string | undefined {
  return component === undefined || component === "" ? undefined : component;
}

/** Analyze an epic (or any issue) and its linked issues. Never mutates `issue`. */
export function analyzeIssue(issue: Issue, component?: string): IssueAnalysis {
  const scopeComponent = normalizeComponent(component);

  const allLinked = issue.linkedIssues.filter(not(isObsolete));
  const scoped = scopeComponent === undefined
    ? allLinked
    : allLinked.filter(hasComponent(scopeComponent));

  const issueNoComponent = allLinked.some(
    and(inProject(issue.project), hasNoComponents),
  );

  const signal = strongestCommentStatus([...scoped, issue]);

  return {
    issue,
    component: scopeComponent,
    allLinked,
    scoped,
    issuesCompletion: scoped.progress(),
    pointsCompletion: scoped.storyPointsProgress(),
    numActivities: scoped.count(isType("Story", "Task", "Bug")),
    issueNoComponent,
    commentStatus: signal.status,
    commentDate: signal.date,
    commentUtcOffset: signal.utcOffset,
  };
}
