import { isObsolete } from "../issues/predicates.js";
import type { Issue, SearchProfile } from "../types.js";

export interface ComponentIssues {
  name: string;
  issues: Issue[];
}

/**
 * Issues grouped by component, groups in first-seen order. An issue lands in
 * every component it or any of its live linked issues declares; issues with
 * none at all are orphans.
 */
export class ComponentsCollection {
  readonly items: ComponentIssues[] = [];
  readonly orphans: Issue[] = [];
  private readonly index = new Map<string, ComponentIssues>();

  /** Ensure the group exists (keeping its position) and append issues to it. */
  add(component: string, ...issues: Issue[]): void {
    let item = this.index.get(component);
    if (!item) {
      item = { name: component, issues: [] };
      this.items.push(item);
      this.index.set(component, item);
    }
    item.issues.push(...issues);
  }

  addIssues(issues: Iterable<Issue>): void {
    for (const issue of issues) {
      const components = new Set(issue.components);

      for (const linked of issue.linkedIssues) {
        if (isObsolete(linked)) continue;
        for (const c of linked.components) components.add(c);
      }

      if (components.size === 0) {
        this.orphans.push(issue);
        continue;
      }

      for (const c of components) this.add(c, issue);
    }
  }

  get(component: string): ComponentIssues | undefined {
    return this.index.get(component);
  }
}

export interface ReportGroup {
  /** Row label: the component name, or UNASSIGNED_GROUP. */
  name: string;
  /** Component the group's issues are evaluated against. */
  component: string | undefined;
  issues: Issue[];
}

export const UNASSIGNED_GROUP = "[UNASSIGNED]";

/**
 * Report blocks for a profile: include-list components first, then the rest
 * in first-seen order, excluded ones dropped, and the orphans last.
 */
export function reportGroups(
  profile: SearchProfile,
  epics: Iterable<Issue>,
): ReportGroup[] {
  const groups = new ComponentsCollection();
  for (const c of profile.components.include) groups.add(c);
  groups.addIssues(epics);

  const excluded = new Set(profile.components.exclude);

  return [
    ...groups.items
      .filter((g) => !excluded.has(g.name))
      .map((g) => ({ name: g.name, component: g.name, issues: g.issues })),
    { name: UNASSIGNED_GROUP, component: undefined, issues: groups.orphans },
  ];
}
