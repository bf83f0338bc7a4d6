import { evaluateIssue } from "../analysis/index.js";
import type { Issue, SearchProfile } from "../types.js";
import {
  sheetBallot,
  sheetCheckStatus,
  sheetDate,
  sheetLink,
  sheetProgressBar,
  sheetSortedMessages,
  sheetStoryPointsBar,
} from "./cells.js";
import { reportGroups } from "./components.js";

/** Cells per issue row; group header rows are padded to the same width. */
export const ROW_WIDTH = 13;

function groupRow(name: string): string[] {
  return [name, ...Array<string>(ROW_WIDTH - 1).fill("")];
}

/** Evaluate one issue and lay out its report row. */
export function issueRow(issue: Issue, component?: string): string[] {
  const { analysis, result } = evaluateIssue(issue, component);
  const mp = issue.marketProblem;

  return [
    sheetLink(issue.link, issue.key),
    issue.summary,
    mp ? sheetLink(mp.link, mp.summary) : "",
    issue.priority,
    issue.status,
    issue.owner,
    issue.qeAssignee,
    sheetProgressBar(analysis.issuesCompletion),
    sheetStoryPointsBar(analysis.pointsCompletion),
    sheetDate(analysis.commentDate, analysis.commentUtcOffset),
    sheetBallot(result.ready),
    sheetCheckStatus(result.status),
    sheetSortedMessages(result.messages),
  ];
}

/** Report rows: a header row per group followed by its issue rows. */
export function buildSheetRows(
  profile: SearchProfile,
  epics: readonly Issue[],
): string[][] {
  const rows: string[][] = [];

  for (const group of reportGroups(profile, epics)) {
    rows.push(groupRow(group.name));
    for (const issue of group.issues) {
      rows.push(issueRow(issue, group.component));
    }
  }

  return rows;
}

/** Quote a field when tabs, quotes, line breaks or leading whitespace would break it. */
export function formatTsvField(field: string): string {
  if (field === "" || !/[\t"\r\n]|^\s/.test(field)) return field;
  return `"${field.replaceAll('"', '""')}"`;
}

export function formatTsv(rows: readonly (readonly string[])[]): string {
  return rows.map((row) => row.map(formatTsvField).join("\t")).join("\n") + "\n";
}
