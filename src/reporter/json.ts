import { evaluateIssue } from "../analysis/index.js";
import type { CheckStatus, CheckVerdict } from "../analysis/result.js";
import type { Issue, Progress, SearchProfile } from "../types.js";
import { reportGroups } from "./components.js";

export interface IssueReport {
  key: string;
  component: string | null;
  analysis: {
    issuesCompletion: Progress;
    pointsCompletion: Progress;
    numActivities: number;
    issueNoComponent: boolean;
    commentStatus: CheckStatus;
    commentDate: string | null;
  };
  result: CheckVerdict;
}

export function issueReport(issue: Issue, component?: string): IssueReport {
  const { analysis, result } = evaluateIssue(issue, component);
  return {
    key: issue.key,
    component: analysis.component ?? null,
    analysis: {
      issuesCompletion: { ...analysis.issuesCompletion },
      pointsCompletion: { ...analysis.pointsCompletion },
      numActivities: analysis.numActivities,
      issueNoComponent: analysis.issueNoComponent,
      commentStatus: analysis.commentStatus,
      commentDate: analysis.commentDate?.toISOString() ?? null,
    },
    result: result.toJSON(),
  };
}

export function buildJsonReports(
  profile: SearchProfile,
  epics: readonly Issue[],
): IssueReport[] {
  return reportGroups(profile, epics).flatMap((group) =>
    group.issues.map((issue) => issueReport(issue, group.component)),
  );
}

/** One JSON document per line. */
export function formatJsonReport(reports: readonly IssueReport[]): string {
  return reports.map((r) => JSON.stringify(r)).join("\n") + "\n";
}
