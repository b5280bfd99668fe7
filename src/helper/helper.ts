import type { ProfileRecord } from "../profile/schema";

const HIDDEN_SUMMARY_FIELDS = new Set(["created_at"]);

// "created_at" -> "Created_At": every run of letters is capitalized.
export function titleCase(field: string): string {
  return field.replace(
    /[A-Za-z]+/g,
    (word) => word[0].toUpperCase() + word.slice(1).toLowerCase()
  );
}

function formatValue(value: unknown): string {
  return Array.isArray(value) ? value.join(", ") : String(value);
}

export function summaryLines(record: ProfileRecord): string[] {
  return Object.entries(record)
    .filter(([field]) => !HIDDEN_SUMMARY_FIELDS.has(field))
    .map(([field, value]) => `${titleCase(field)}: ${formatValue(value)}`);
}
