import type { Progress } from "../types.js";

export function emptyProgress(): Progress {
  return { completed: 0, total: 0, unknown: 0 };
}

export function remaining(progress: Progress): number {
  return progress.total - progress.completed;
}

/** No item was left out of `total` for lack of data. */
export function isFullyEstimated(progress: Progress): boolean {
  return progress.unknown === 0;
}
