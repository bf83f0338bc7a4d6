import type { Issue, Progress } from "../types.js";
import {
  hasStoryPoints,
  isObsolete,
  isResolved,
  isType,
  type IssuePredicate,
} from "./predicates.js";
import { emptyProgress } from "./progress.js";

/**
 * Ordered, immutable sequence of issues. Order only matters to callers that
 * care which issue they meet first; the aggregates ignore it.
 */
export class IssueCollection implements Iterable<Issue> {
  private readonly items: readonly Issue[];

  constructor(issues: Iterable<Issue> = []) {
    this.items = Object.freeze([...issues]);
  }

  get length(): number {
    return this.items.length;
  }

  [Symbol.iterator](): Iterator<Issue> {
    return this.items[Symbol.iterator]();
  }

  toArray(): Issue[] {
    return [...this.items];
  }

  /** Issues matching the predicate, relative order kept. May be empty. */
  filter(predicate: IssuePredicate): IssueCollection {
    return new IssueCollection(this.items.filter(predicate));
  }

  some(predicate: IssuePredicate): boolean {
    return this.items.some(predicate);
  }

  count(predicate: IssuePredicate): number {
    let n = 0;
    for (const issue of this.items) {
      if (predicate(issue)) n++;
    }
    return n;
  }

  /** One unit per non-obsolete issue; resolved issues count as completed. */
  progress(): Progress {
    const result = emptyProgress();

    for (const issue of this.items) {
      if (isObsolete(issue)) continue;

      result.total++;
      if (isResolved(issue)) result.completed++;
    }

    return result;
  }

  /**
   * Story points of non-obsolete stories. Stories without an estimate go to
   * `unknown` instead of `total`; other issue types are ignored.
   */
  storyPointsProgress(): Progress {
    const result = emptyProgress();
    const isStory = isType("Story");

    for (const issue of this.items) {
      if (isObsolete(issue) || !isStory(issue)) continue;

      if (!hasStoryPoints(issue)) {
        result.unknown++;
        continue;
      }

      result.total += issue.storyPoints;
      if (isResolved(issue)) result.completed += issue.storyPoints;
    }

    return result;
  }
}
