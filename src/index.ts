export * from "./analysis/index.js";
export { IssueCollection } from "./issues/collection.js";
export * from "./issues/predicates.js";
export * from "./issues/progress.js";
export * from "./types.js";
export {
  JiraAuthError,
  JiraClient,
  JiraClientError,
  epicChildrenJql,
  keysJql,
  type JiraClientOptions,
} from "./jira/client.js";
export { CUSTOM_FIELDS, resolveFieldMap, type CustomField, type FieldMap } from "./jira/fields.js";
export { toIssue, deliveryOwner, type MapperContext } from "./jira/mapper.js";
export { loadConfig, findProfile } from "./config/loader.js";
export { ComponentsCollection, reportGroups, UNASSIGNED_GROUP } from "./reporter/components.js";
export { buildSheetRows, formatTsv, issueRow } from "./reporter/sheet.js";
export { buildJsonReports, formatJsonReport, issueReport } from "./reporter/json.js";
