import { z } from "zod";
import { findProfile, loadConfig } from "../config/loader.js";
import { JiraClient, type JiraClientOptions } from "../jira/client.js";
import { buildJsonReports, formatJsonReport } from "../reporter/json.js";
import { buildSheetRows, formatTsv } from "../reporter/sheet.js";
import type { Issue } from "../types.js";

export const reportOptionsSchema = z.object({
  config: z.string().min(1, "configuration file not specified"),
  profile: z.string().min(1, "profile id not specified"),
  user: z.string().min(1, "tracker username not specified"),
  json: z.boolean().default(false),
});
export type ReportOptions = z.infer<typeof reportOptionsSchema>;

/** Anything that can resolve epics for a JQL query. */
export interface EpicSource {
  findEpics(jql: string): Promise<Issue[]>;
}

export interface ReportDeps {
  connect: (opts: JiraClientOptions) => Promise<EpicSource>;
  password: () => Promise<string>;
  write: (text: string) => void;
}

/**
 * Fetch the profile's epics and write the report. Configuration and tracker
 * failures reject; the caller decides how to exit.
 */
export async function runReport(options: ReportOptions, deps: ReportDeps): Promise<void> {
  const config = await loadConfig(options.config);

  const profile = findProfile(config, options.profile);
  if (!profile) {
    throw new Error(`profile '${options.profile}' not found`);
  }

  const client = await deps.connect({
    baseUrl: config.instance.url,
    username: options.user,
    password: await deps.password(),
  });

  console.error(`[epic-readiness] JQL = ${profile.jql}`);
  const epics = await client.findEpics(profile.jql);
  console.error(`[epic-readiness] JQL returned issues: ${epics.length}`);

  if (options.json) {
    deps.write(formatJsonReport(buildJsonReports(profile, epics)));
  } else {
    deps.write(formatTsv(buildSheetRows(profile, epics)));
  }
}

export const defaultReportDeps = (password: () => Promise<string>): ReportDeps => ({
  connect: (opts) => JiraClient.connect(opts),
  password,
  write: (text) => {
    process.stdout.write(text);
  },
});
