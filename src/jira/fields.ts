import type { FieldDescriptor } from "./schemas.js";

/** Custom fields the provider reads, keyed by the name the tracker shows. */
export const CUSTOM_FIELDS = [
  ["parentLink", "Parent Link"],
  ["epicLink", "Epic Link"],
  ["storyPoints", "Story Points"],
  ["approvals", "5-Acks Check"],
  ["readiness", "Readiness"],
  ["planning", "Planning"],
  ["qeAssignee", "QA Contact"],
  ["acceptance", "Acceptance Criteria"],
  ["designDoc", "Design Doc"],
  ["flagged", "Flagged"],
] as const;

export type CustomField = (typeof CUSTOM_FIELDS)[number][0];

/** Custom field → tracker field id. Fields the instance lacks are absent. */
export type FieldMap = Readonly<Partial<Record<CustomField, string>>>;

const FIELD_BY_NAME = new Map<string, CustomField>(
  CUSTOM_FIELDS.map(([field, name]) => [name, field]),
);

/** Build the lookup table once per run from the instance's field list. */
export function resolveFieldMap(fields: readonly FieldDescriptor[]): FieldMap {
  const map: Partial<Record<CustomField, string>> = {};
  for (const f of fields) {
    const field = FIELD_BY_NAME.get(f.name);
    if (field !== undefined) map[field] = f.id;
  }
  return Object.freeze(map);
}
