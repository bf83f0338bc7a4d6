import { describe, it, expect } from "vitest";
import { analyzeIssue } from "../../src/analysis/analysis.js";
import { CHECK_RULES, applyRule, checkIssue } from "../../src/analysis/checks.js";
import { evaluateIssue } from "../../src/analysis/index.js";
import { CheckResult, type CheckVerdict } from "../../src/analysis/result.js";
import type { Issue } from "../../src/types.js";
import { comment, linked, makeIssue, makeStory } from "../helpers.js";

function verdict(issue: Issue, component?: string): CheckVerdict {
  return checkIssue(analyzeIssue(issue, component)).toJSON();
}

// ── Baseline ─────────────────────────────────────────────────────────

describe("checkIssue baseline", () => {
  it("passes a groomed, active epic with a GREEN status comment", () => {
    expect(verdict(makeIssue(), "Backend")).toEqual({
      ready: true,
      status: "GREEN",
      messages: [],
    });
  });

  it("short-circuits obsolete issues whatever else is wrong", () => {
    const issue = makeIssue({
      status: "Obsolete",
      fixVersions: [],
      description: "",
      owner: "",
      priority: "",
      impediment: true,
      comments: [comment("RED: dead", "2024-05-01T00:00:00.000Z")],
      linkedIssues: linked(),
    });

    expect(verdict(issue, "Backend")).toEqual({
      ready: true,
      status: "NONE",
      messages: ["OBSOLETE"],
    });
  });
});

// ── One rule at a time ───────────────────────────────────────────────

describe("individual rules", () => {
  const cases: Array<[string, Partial<Issue>, CheckVerdict]> = [
    ["alongside release", { fixVersions: ["Alongside 2.0"] }, { ready: true, status: "GREEN", messages: ["ALONGSIDE"] }],
    ["no fix version", { fixVersions: [] }, { ready: false, status: "GREEN", messages: ["NOVERSION"] }],
    ["several fix versions", { fixVersions: ["1.0", "1.1"] }, { ready: true, status: "GREEN", messages: ["MULTIVERSION"] }],
    ["no description", { description: "" }, { ready: false, status: "GREEN", messages: ["NODESCRIPTION"] }],
    [
      "missing readiness flag",
      {
        readiness: {
          development: true,
          product: true,
          quality: true,
          experience: true,
          documentation: true,
          support: false,
        },
      },
      { ready: false, status: "GREEN", messages: ["NOTREADY"] },
    ],
    [
      "missing approval",
      {
        approvals: {
          development: true,
          product: true,
          quality: true,
          experience: true,
          documentation: false,
        },
      },
      { ready: true, status: "RED", messages: ["NOACKS"] },
    ],
    ["no delivery owner", { owner: "" }, { ready: false, status: "RED", messages: ["NODELIVERYOWNER"] }],
    [
      "QE assigned although quality is not planned",
      { planning: { noFeature: false, noQuality: true, noDocumentation: false } },
      { ready: false, status: "GREEN", messages: ["NOQEMISMATCH"] },
    ],
    ["no QE assignee", { qeAssignee: "" }, { ready: false, status: "RED", messages: ["NOQEASSIGNEE"] }],
    [
      "no QE assignee when quality is not planned",
      { qeAssignee: "", planning: { noFeature: false, noQuality: true, noDocumentation: false } },
      { ready: true, status: "GREEN", messages: [] },
    ],
    ["no acceptance criteria", { acceptance: "" }, { ready: false, status: "RED", messages: ["NOCRITERIA"] }],
    ["empty priority", { priority: "" }, { ready: false, status: "RED", messages: ["NOPRIORITY"] }],
    ["unprioritized", { priority: "Unprioritized" }, { ready: false, status: "RED", messages: ["NOPRIORITY"] }],
    ["not started", { status: "New" }, { ready: true, status: "YELLOW", messages: ["NOTSTARTED"] }],
    ["impeded epic", { impediment: true }, { ready: true, status: "RED", messages: ["IMPEDIMENT"] }],
    [
      "impeded linked issue",
      { linkedIssues: linked(makeStory({ impediment: true })) },
      { ready: true, status: "RED", messages: ["IMPEDIMENT"] },
    ],
    [
      "impeded but obsolete linked issue",
      { linkedIssues: linked(makeStory(), makeStory({ key: "DEMO-12", impediment: true, status: "Obsolete" })) },
      { ready: true, status: "GREEN", messages: [] },
    ],
    ["no market problem", { marketProblem: null }, { ready: false, status: "GREEN", messages: ["NOMARKETPROBLEM"] }],
    [
      "linked issue without component",
      { linkedIssues: linked(makeStory(), makeStory({ key: "DEMO-12", type: "Task", components: [] })) },
      { ready: false, status: "GREEN", messages: ["ISSUENOCOMPONENT"] },
    ],
    ["no status comment", { comments: [] }, { ready: true, status: "NONE", messages: ["NOSTATUSCOMMENT"] }],
    [
      "RED status comment",
      { comments: [comment("RED: blocked", "2024-05-01T00:00:00.000Z")] },
      { ready: true, status: "RED", messages: [] },
    ],
    ["no design document", { designDoc: "" }, { ready: false, status: "GREEN", messages: ["NODESIGN"] }],
    [
      "no design document for a non-feature epic",
      { designDoc: "", planning: { noFeature: true, noQuality: false, noDocumentation: false } },
      { ready: true, status: "GREEN", messages: [] },
    ],
  ];

  it.each(cases)("%s", (_name, overrides, expected) => {
    expect(verdict(makeIssue(overrides))).toEqual(expected);
  });
});

// ── Activities and started stories ───────────────────────────────────

describe("activities", () => {
  it("flags an active epic with no children, in evaluation order", () => {
    expect(verdict(makeIssue({ linkedIssues: linked() }))).toEqual({
      ready: false,
      status: "RED",
      messages: ["NOSTORIES", "NOACTIVESTORIES"],
    });
  });

  it("counts only stories, tasks and bugs as activities", () => {
    const issue = makeIssue({
      status: "New",
      linkedIssues: linked(makeStory({ type: "Epic" }), makeStory({ key: "DEMO-12", type: "Initiative" })),
    });

    const result = verdict(issue);
    expect(result.ready).toBe(false);
    expect(result.messages).toEqual(["NOSTORIES", "NOTSTARTED"]);
  });

  it("requires an active or done story under an active epic", () => {
    const issue = makeIssue({
      linkedIssues: linked(makeStory({ status: "New" }), makeStory({ key: "DEMO-12", status: "Backlog" })),
    });

    expect(verdict(issue)).toEqual({
      ready: true,
      status: "RED",
      messages: ["NOACTIVESTORIES"],
    });
  });

  it("accepts a done story as started work", () => {
    const issue = makeIssue({
      linkedIssues: linked(makeStory({ status: "Done", resolution: "Done" })),
    });
    expect(verdict(issue).messages).toEqual([]);
  });

  it("does not apply epic-only rules to stories", () => {
    const story = makeStory({
      epicLink: "DEMO-10",
      description: "Index all documents",
      owner: "dev1",
      qeAssignee: "qe1",
      acceptance: "Indexed",
      designDoc: "https://docs.example.com/index",
      comments: [comment("GREEN: fine", "2024-05-01T00:00:00.000Z")],
    });

    expect(verdict(story)).toEqual({ ready: true, status: "GREEN", messages: [] });
  });

  it("requires a story to belong to an epic", () => {
    const story = makeStory({
      epicLink: "",
      description: "Index all documents",
      owner: "dev1",
      qeAssignee: "qe1",
      acceptance: "Indexed",
      designDoc: "https://docs.example.com/index",
      comments: [comment("GREEN: fine", "2024-05-01T00:00:00.000Z")],
    });

    expect(verdict(story)).toEqual({ ready: false, status: "GREEN", messages: ["NOEPIC"] });
  });
});

// ── Components ───────────────────────────────────────────────────────

describe("component scope", () => {
  it("flags an epic with two components when scoped to one", () => {
    const issue = makeIssue({ components: ["Backend", "UI"] });

    expect(verdict(issue, "Backend")).toEqual({
      ready: false,
      status: "YELLOW",
      messages: ["MULTICOMPONENT"],
    });
  });

  it("does not check epic components without a scope", () => {
    const issue = makeIssue({ components: ["Backend", "UI"] });
    expect(verdict(issue).messages).toEqual([]);
  });

  it("finds no stories when none carry the scoped component", () => {
    const issue = makeIssue({ components: ["UI"] });

    expect(verdict(issue, "UI")).toEqual({
      ready: false,
      status: "RED",
      messages: ["NOSTORIES", "NOACTIVESTORIES"],
    });
  });
});

// ── Done consistency ─────────────────────────────────────────────────

describe("done epics", () => {
  const doneStory = makeStory({ status: "Done", resolution: "Done", storyPoints: 5 });

  it("turns GREEN when all linked work is complete", () => {
    const issue = makeIssue({ status: "Done", comments: [], linkedIssues: linked(doneStory) });

    expect(verdict(issue)).toEqual({
      ready: true,
      status: "GREEN",
      messages: ["NOSTATUSCOMMENT"],
    });
  });

  it("turns RED when a linked issue is unresolved", () => {
    const issue = makeIssue({
      status: "Done",
      comments: [comment("GREEN: shipped", "2024-05-01T00:00:00.000Z")],
      linkedIssues: linked(doneStory, makeStory({ key: "DEMO-12", type: "Task" })),
    });

    expect(verdict(issue)).toEqual({
      ready: true,
      status: "RED",
      messages: ["NOTDONE"],
    });
  });

  it("keeps a higher severity raised earlier", () => {
    const issue = makeIssue({ status: "Done", owner: "", comments: [], linkedIssues: linked(doneStory) });

    expect(verdict(issue)).toEqual({
      ready: false,
      status: "RED",
      messages: ["NODELIVERYOWNER", "NOSTATUSCOMMENT"],
    });
  });
});

// ── Accumulator ──────────────────────────────────────────────────────

describe("CheckResult", () => {
  it("never becomes ready again once not ready", () => {
    const r = new CheckResult();
    r.setReady(false).setReady(true);
    expect(r.ready).toBe(false);
  });

  it("only raises the status", () => {
    const r = new CheckResult();
    expect(r.status).toBe("NONE");
    r.setStatus("YELLOW").setStatus("GREEN").setStatus("NONE");
    expect(r.status).toBe("YELLOW");
    r.setStatus("RED");
    expect(r.status).toBe("RED");
  });

  it("keeps messages in insertion order", () => {
    const r = new CheckResult().addMessage("NOVERSION").addMessage("ALONGSIDE");
    expect(r.toJSON()).toEqual({ ready: true, status: "NONE", messages: ["NOVERSION", "ALONGSIDE"] });
  });
});

describe("rule table", () => {
  it("has unique rule names", () => {
    const names = CHECK_RULES.map((r) => r.name);
    expect(new Set(names).size).toBe(names.length);
  });

  it("applies a rule only when its condition holds", () => {
    const rule = CHECK_RULES.find((r) => r.name === "delivery-owner");
    expect(rule).toBeDefined();
    if (!rule) return;

    const unowned = new CheckResult();
    expect(applyRule(rule, analyzeIssue(makeIssue({ owner: "" })), unowned)).toBe(true);
    expect(unowned.toJSON()).toEqual({ ready: false, status: "RED", messages: ["NODELIVERYOWNER"] });

    const owned = new CheckResult();
    expect(applyRule(rule, analyzeIssue(makeIssue()), owned)).toBe(false);
    expect(owned.toJSON()).toEqual({ ready: true, status: "NONE", messages: [] });
  });

  it("reaches the same verdict whatever order the rules run in, messages aside", () => {
    const issue = makeIssue({ owner: "", status: "New", fixVersions: [], components: ["Backend", "UI"] });
    const analysis = analyzeIssue(issue, "Backend");

    const forward = checkIssue(analysis).toJSON();
    const backward = checkIssue(analysis, [...CHECK_RULES].reverse()).toJSON();

    expect(backward.ready).toBe(forward.ready);
    expect(backward.status).toBe(forward.status);
    expect([...backward.messages].reverse()).toEqual(forward.messages);
  });

  it("evaluates the same input identically twice", () => {
    const issue = makeIssue({ priority: "", impediment: true });
    const first = evaluateIssue(issue, "Backend");
    const second = evaluateIssue(issue, "Backend");

    expect(JSON.stringify(second.result)).toBe(JSON.stringify(first.result));
  });
});
