import {
  isActive,
  isDone,
  isImpeded,
  isObsolete,
  isPrioritized,
  isType,
  or,
} from "../issues/predicates.js";
import type { IssueAnalysis } from "./analysis.js";
import { CheckResult, type CheckMessage, type CheckStatus } from "./result.js";

/**
 * One entry of the check battery. When `when` holds, the rule marks the
 * issue not ready (if `notReady`), raises the status (if `status`) and
 * records `message` (if any).
 */
export interface CheckRule {
  name: string;
  when: (a: IssueAnalysis) => boolean;
  message?: CheckMessage;
  notReady?: boolean;
  status?: CheckStatus | ((a: IssueAnalysis) => CheckStatus);
}

const isEpic = isType("Epic");
const isStory = isType("Story");
const isActiveOrDone = or(isActive, isDone);

function allTrue(flags: object): boolean {
  return Object.values(flags).every((v) => v === true);
}

/** Progress counted in full, story points included. */
function linkedWorkComplete(a: IssueAnalysis): boolean {
  const issues = a.issuesCompletion;
  const points = a.pointsCompletion;
  return issues.completed === issues.total && points.completed === points.total;
}

/** The check battery, in evaluation order. */
export const CHECK_RULES: readonly CheckRule[] = [
  {
    name: "alongside",
    when: (a) => a.issue.fixVersions.some((v) => v.startsWith("Alongside")),
    message: "ALONGSIDE",
  },
  {
    name: "version-presence",
    when: (a) => a.issue.fixVersions.length === 0,
    notReady: true,
    message: "NOVERSION",
  },
  {
    name: "version-multiplicity",
    when: (a) => a.issue.fixVersions.length > 1,
    message: "MULTIVERSION",
  },
  {
    name: "activities",
    when: (a) => isEpic(a.issue) && a.numActivities === 0,
    notReady: true,
    message: "NOSTORIES",
  },
  {
    name: "description",
    when: (a) => a.issue.description === "",
    notReady: true,
    message: "NODESCRIPTION",
  },
  {
    name: "readiness",
    when: (a) => isEpic(a.issue) && !allTrue(a.issue.readiness),
    notReady: true,
    message: "NOTREADY",
  },
  {
    name: "approvals",
    when: (a) => isEpic(a.issue) && !allTrue(a.issue.approvals),
    status: "RED",
    message: "NOACKS",
  },
  {
    name: "delivery-owner",
    when: (a) => a.issue.owner === "",
    notReady: true,
    status: "RED",
    message: "NODELIVERYOWNER",
  },
  {
    name: "qe-mismatch",
    when: (a) => a.issue.planning.noQuality && a.issue.qeAssignee !== "",
    notReady: true,
    message: "NOQEMISMATCH",
  },
  {
    name: "qe-assignee",
    when: (a) => !a.issue.planning.noQuality && a.issue.qeAssignee === "",
    notReady: true,
    status: "RED",
    message: "NOQEASSIGNEE",
  },
  {
    name: "acceptance-criteria",
    when: (a) => a.issue.acceptance === "",
    notReady: true,
    status: "RED",
    message: "NOCRITERIA",
  },
  {
    name: "priority",
    when: (a) => !isPrioritized(a.issue),
    notReady: true,
    status: "RED",
    message: "NOPRIORITY",
  },
  {
    name: "started",
    when: (a) => !isActiveOrDone(a.issue),
    status: "YELLOW",
    message: "NOTSTARTED",
  },
  {
    name: "impediment",
    when: (a) => isImpeded(a.issue) || a.allLinked.some(isImpeded),
    status: "RED",
    message: "IMPEDIMENT",
  },
  {
    name: "market-problem",
    when: (a) => isEpic(a.issue) && a.issue.marketProblem === null,
    notReady: true,
    message: "NOMARKETPROBLEM",
  },
  {
    name: "issue-component-coverage",
    when: (a) => a.issueNoComponent,
    notReady: true,
    message: "ISSUENOCOMPONENT",
  },
  {
    name: "multi-component",
    when: (a) => a.component !== undefined && a.issue.components.length !== 1,
    notReady: true,
    status: "YELLOW",
    message: "MULTICOMPONENT",
  },
  {
    name: "done-incomplete",
    when: (a) => isDone(a.issue) && !linkedWorkComplete(a),
    status: "RED",
    message: "NOTDONE",
  },
  {
    // Usually a no-op: anything above that raised the status wins.
    name: "done-complete",
    when: (a) => isDone(a.issue) && linkedWorkComplete(a),
    status: "GREEN",
  },
  {
    name: "started-stories",
    when: (a) =>
      isEpic(a.issue) && isActive(a.issue) && !a.scoped.some(isActiveOrDone),
    status: "RED",
    message: "NOACTIVESTORIES",
  },
  {
    name: "linked-epic",
    when: (a) => isStory(a.issue) && a.issue.epicLink === "",
    notReady: true,
    message: "NOEPIC",
  },
  {
    name: "status-comment-missing",
    when: (a) => a.commentStatus === "NONE",
    message: "NOSTATUSCOMMENT",
  },
  {
    name: "status-comment",
    when: (a) => a.commentStatus !== "NONE",
    status: (a) => a.commentStatus,
  },
  {
    name: "design-doc",
    when: (a) => !a.issue.planning.noFeature && a.issue.designDoc === "",
    notReady: true,
    message: "NODESIGN",
  },
];

/** Apply one rule to the accumulator. Returns whether the rule fired. */
export function applyRule(
  rule: CheckRule,
  analysis: IssueAnalysis,
  result: CheckResult,
): boolean {
  if (!rule.when(analysis)) return false;

  if (rule.notReady) result.setReady(false);
  if (rule.status !== undefined) {
    result.setStatus(
      typeof rule.status === "function" ? rule.status(analysis) : rule.status,
    );
  }
  if (rule.message !== undefined) result.addMessage(rule.message);

  return true;
}

/**
 * Run the check battery against an analysis. Obsolete issues are reported as
 * such and nothing else runs.
 */
export function checkIssue(
  analysis: IssueAnalysis,
  rules: readonly CheckRule[] = CHECK_RULES,
): CheckResult {
  const result = new CheckResult();

  if (isObsolete(analysis.issue)) {
    return result.addMessage("OBSOLETE");
  }

  for (const rule of rules) {
    applyRule(rule, analysis, result);
  }

  return result;
}

