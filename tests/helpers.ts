import { IssueCollection } from "../src/issues/collection.js";
import type { Issue, IssueComment } from "../src/types.js";

export function comment(body: string, updated: string, utcOffset = 0): IssueComment {
  return { body, created: new Date(updated), updated: new Date(updated), utcOffset };
}

function issueUrl(key: string): string {
  return `https://issues.example.com/browse/${key}`;
}

/** Apply overrides, deriving `link` from the final key unless one is given. */
function withOverrides(base: Issue, overrides: Partial<Issue>): Issue {
  const issue = { ...base, ...overrides };
  return { ...issue, link: overrides.link ?? issueUrl(issue.key) };
}

/**
 * An issue that passes every check: an active, groomed epic in project DEMO
 * with component Backend, linked to an initiative, with a GREEN status comment.
 * Override fields to break exactly what a test needs.
 */
export function makeIssue(overrides: Partial<Issue> = {}): Issue {
  return withOverrides({
    key: "DEMO-10",
    project: "DEMO",
    link: issueUrl("DEMO-10"),
    summary: "Search revamp",
    description: "Rework the search backend",
    type: "Epic",
    status: "In Progress",
    priority: "Major",
    resolution: "",
    components: ["Backend"],
    fixVersions: ["1.0"],
    comments: [comment("GREEN: on track", "2024-05-02T10:00:00.000Z")],
    storyPoints: null,
    owner: "owner1",
    qeAssignee: "qe1",
    acceptance: "Search returns results in under a second",
    designDoc: "https://docs.example.com/search",
    readiness: {
      development: true,
      product: true,
      quality: true,
      experience: true,
      documentation: true,
      support: true,
    },
    planning: { noFeature: false, noQuality: false, noDocumentation: false },
    approvals: {
      development: true,
      product: true,
      quality: true,
      experience: true,
      documentation: true,
    },
    impediment: false,
    parentLink: "DEMO-1",
    epicLink: "",
    marketProblem: makeInitiative(),
    linkedIssues: new IssueCollection([makeStory()]),
  }, overrides);
}

export function makeInitiative(overrides: Partial<Issue> = {}): Issue {
  return withOverrides({
    ...makeLeaf(),
    key: "DEMO-1",
    summary: "Faster search",
    type: "Initiative",
    components: [],
    storyPoints: null,
    epicLink: "",
  }, overrides);
}

export function makeStory(overrides: Partial<Issue> = {}): Issue {
  return withOverrides(makeLeaf(), overrides);
}

function makeLeaf(): Issue {
  return {
    key: "DEMO-11",
    project: "DEMO",
    link: issueUrl("DEMO-11"),
    summary: "Index documents",
    description: "",
    type: "Story",
    status: "In Progress",
    priority: "Major",
    resolution: "",
    components: ["Backend"],
    fixVersions: ["1.0"],
    comments: [],
    storyPoints: 3,
    owner: "dev1",
    qeAssignee: "",
    acceptance: "",
    designDoc: "",
    readiness: {
      development: false,
      product: false,
      quality: false,
      experience: false,
      documentation: false,
      support: false,
    },
    planning: { noFeature: false, noQuality: false, noDocumentation: false },
    approvals: {
      development: false,
      product: false,
      quality: false,
      experience: false,
      documentation: false,
    },
    impediment: false,
    parentLink: "",
    epicLink: "DEMO-10",
    marketProblem: null,
    linkedIssues: new IssueCollection(),
  };
}

export function linked(...issues: Issue[]): IssueCollection {
  return new IssueCollection(issues);
}
