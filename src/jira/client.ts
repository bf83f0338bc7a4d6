import type { z } from "zod";
import { IssueCollection } from "../issues/collection.js";
import type { Issue } from "../types.js";
import { resolveFieldMap, type FieldMap } from "./fields.js";
import { toIssue, type MapperContext } from "./mapper.js";
import { fieldListSchema, projectSchema, searchPageSchema } from "./schemas.js";

export class JiraClientError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
  ) {
    super(message);
    this.name = "JiraClientError";
  }
}

/** HTTP 401/403: the credentials were rejected. */
export class JiraAuthError extends JiraClientError {
  constructor(status: number) {
    super("Access Unauthorized: check basic authentication", status);
    this.name = "JiraAuthError";
  }
}

export interface JiraClientOptions {
  /** Instance URL, e.g. https://issues.example.com/ */
  baseUrl: string;
  username?: string;
  password?: string;
  /** Search page size. Default 50. */
  pageSize?: number;
}

const DEFAULT_PAGE_SIZE = 50;

/** Children of an epic, in key order. */
export function epicChildrenJql(epicKey: string): string {
  return `issueFunction in issuesInEpics("Key = ${epicKey}") ORDER BY Key ASC`;
}

export function keysJql(keys: readonly string[]): string {
  return `key in (${keys.join(", ")}) ORDER BY Key ASC`;
}

function normalizeBaseUrl(url: string): string {
  return url.endsWith("/") ? url : `${url}/`;
}

/**
 * Read-only client for a tracker's REST API v2, over basic auth.
 * Every failure rejects; nothing is retried.
 */
export class JiraClient {
  private readonly baseUrl: string;
  private readonly authorization: string | undefined;
  private readonly pageSize: number;
  private readonly mapper: MapperContext;

  constructor(opts: JiraClientOptions, fieldMap: FieldMap) {
    if (!opts.baseUrl) {
      throw new JiraClientError("Tracker instance URL is required");
    }
    this.baseUrl = normalizeBaseUrl(opts.baseUrl);
    this.authorization = opts.username
      ? `Basic ${Buffer.from(`${opts.username}:${opts.password ?? ""}`).toString("base64")}`
      : undefined;
    this.pageSize = opts.pageSize ?? DEFAULT_PAGE_SIZE;
    this.mapper = { fieldMap, baseUrl: this.baseUrl };
  }

  /** Create a client after resolving the instance's custom field ids. */
  static async connect(opts: JiraClientOptions): Promise<JiraClient> {
    const bootstrap = new JiraClient(opts, {});
    const fields = await bootstrap.get("rest/api/2/field", fieldListSchema);
    return new JiraClient(opts, resolveFieldMap(fields));
  }

  get fieldMap(): FieldMap {
    return this.mapper.fieldMap;
  }

  private async get<S extends z.ZodTypeAny>(
    path: string,
    schema: S,
    params?: Record<string, string>,
  ): Promise<z.infer<S>> {
    const url = new URL(path, this.baseUrl);
    for (const [name, value] of Object.entries(params ?? {})) {
      url.searchParams.set(name, value);
    }

    const headers: Record<string, string> = { Accept: "application/json" };
    if (this.authorization) headers.Authorization = this.authorization;

    const response = await fetch(url, { method: "GET", headers });

    if (response.status === 401 || response.status === 403) {
      throw new JiraAuthError(response.status);
    }
    if (!response.ok) {
      const body = await response.text();
      throw new JiraClientError(
        `Tracker request failed (${response.status}) ${url.pathname}: ${body}`,
        response.status,
      );
    }

    const data: unknown = await response.json();
    return schema.parse(data);
  }

  /** All issues matched by the JQL search, paging until an empty page. */
  async findIssues(jql: string): Promise<Issue[]> {
    const issues: Issue[] = [];

    for (;;) {
      const page = await this.get("rest/api/2/search", searchPageSchema, {
        jql,
        startAt: String(issues.length),
        maxResults: String(this.pageSize),
        validateQuery: "strict",
        fields: "*all",
      });

      if (page.issues.length === 0) break;

      for (const raw of page.issues) {
        issues.push(toIssue(raw, this.mapper));
      }
    }

    return issues;
  }

  /**
   * Epics matched by the JQL, each with its linked issues and market problem
   * resolved. Children of every epic are fetched concurrently; the first
   * failure rejects the whole call.
   */
  async findEpics(jql: string): Promise<Issue[]> {
    const epics = await this.findIssues(jql);

    const parentKeys = [
      ...new Set(epics.map((e) => e.parentLink).filter((k) => k !== "")),
    ];

    const [children, parents] = await Promise.all([
      Promise.all(epics.map((e) => this.findIssues(epicChildrenJql(e.key)))),
      parentKeys.length > 0
        ? this.findIssues(keysJql(parentKeys))
        : Promise.resolve<Issue[]>([]),
    ]);

    const parentByKey = new Map(parents.map((p) => [p.key, p]));

    return epics.map((epic, i) => ({
      ...epic,
      linkedIssues: new IssueCollection(children[i]),
      marketProblem: parentByKey.get(epic.parentLink) ?? null,
    }));
  }

  /** Component names declared by a project. */
  async findProjectComponents(project: string): Promise<string[]> {
    const data = await this.get(
      `rest/api/2/project/${encodeURIComponent(project)}`,
      projectSchema,
    );
    return data.components.map((c) => c.name);
  }
}
