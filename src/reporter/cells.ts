import type { CheckMessage, CheckStatus } from "../analysis/result.js";
import { isFullyEstimated, remaining } from "../issues/progress.js";
import type { Progress } from "../types.js";

/** Placeholder for an empty or meaningless cell. */
export const DASH = "—";
export const CHECK_MARK = "✓";
export const CROSS_MARK = "✗";

const BAR_OPTIONS = '{"charttype","bar";"color1","#93c47d";"color2","#efefef"}';

/** Escape a string literal inside a spreadsheet formula. */
function formulaString(value: string): string {
  return `"${value.replaceAll('"', '""')}"`;
}

export function sheetLink(link: string, text: string): string {
  return `=HYPERLINK(${formulaString(link)},${formulaString(text)})`;
}

export function sheetBallot(value: boolean): string {
  return value ? CHECK_MARK : CROSS_MARK;
}

export function sheetProgressBar(progress: Progress): string {
  const { completed, total } = progress;
  if (completed > total || (total === 0 && completed === 0)) {
    return DASH;
  }
  return `=SPARKLINE({${completed},${remaining(progress)}},${BAR_OPTIONS})`;
}

/** Like a progress bar, but a dash when some story was never estimated. */
export function sheetStoryPointsBar(progress: Progress): string {
  if (!isFullyEstimated(progress)) return DASH;
  return sheetProgressBar(progress);
}

export function sheetCheckStatus(status: CheckStatus): string {
  return status === "NONE" ? DASH : status;
}

/** Calendar date in the given offset from UTC (minutes), or a dash. */
export function sheetDate(date: Date | null, utcOffset = 0): string {
  if (date === null) return DASH;
  return new Date(date.getTime() + utcOffset * 60_000).toISOString().slice(0, 10);
}

export function sheetSortedMessages(
  messages: readonly CheckMessage[],
  sep = ",",
): string {
  return [...messages].sort().join(sep);
}
