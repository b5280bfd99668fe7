type FieldPredicate = (value: string) => boolean;

const EMAIL_PATTERN = /^[\w.-]+@[\w.-]+\.[A-Za-z]+$/;
const PHONE_PATTERN = /^\d{10}$/;
const DIGITS_PATTERN = /^\d+$/;

const FIELD_VALIDATORS = new Map<string, FieldPredicate>([
  ["text", (value) => [...value].length >= 2],
  [
    "number",
    (value) => DIGITS_PATTERN.test(value) && Number.parseInt(value, 10) <= 99,
  ],
  ["email", (value) => EMAIL_PATTERN.test(value)],
  ["phone", (value) => PHONE_PATTERN.test(value.replace(/[- ]/g, ""))],
  [
    "list",
    (value) => value.split(",").every((item) => item.trim().length > 0),
  ],
]);

// Kinds without a rule accept anything non-blank.
const acceptAny: FieldPredicate = () => true;

/**
 * Checks a raw answer against the rule for its field kind.
 * Blank input is always rejected; the rule sees the trimmed value.
 */
export function validate(
  kind: string,
  value: string | null | undefined
): boolean {
  if (!value || !value.trim()) return false;
  const predicate = FIELD_VALIDATORS.get(kind) ?? acceptAny;
  return predicate(value.trim());
}
