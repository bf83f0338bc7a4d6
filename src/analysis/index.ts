import type { Issue } from "../types.js";
import { analyzeIssue, type IssueAnalysis } from "./analysis.js";
import { checkIssue } from "./checks.js";
import type { CheckResult } from "./result.js";

export interface IssueEvaluation {
  analysis: IssueAnalysis;
  result: CheckResult;
}

/** Analyze one issue and run the check battery over it. Pure and synchronous. */
export function evaluateIssue(issue: Issue, component?: string): IssueEvaluation {
  const analysis = analyzeIssue(issue, component);
  return { analysis, result: checkIssue(analysis) };
}

export { analyzeIssue, getIssueCommentStatus } from "./analysis.js";
export type { IssueAnalysis, CommentSignal } from "./analysis.js";
export { CHECK_RULES, applyRule, checkIssue } from "./checks.js";
export type { CheckRule } from "./checks.js";
export {
  CHECK_MESSAGES,
  CHECK_STATUSES,
  CheckResult,
  compareStatus,
} from "./result.js";
export type { CheckMessage, CheckStatus, CheckVerdict } from "./result.js";
