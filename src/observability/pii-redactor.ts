/**
 * Masks personal data in text bound for logs and the audit trail. Rules
 * run in order; card and IBAN numbers go before the looser phone pattern.
 */

const RULES: ReadonlyArray<readonly [RegExp, string]> = [
  [/[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g, '[EMAIL_REDACTED]'],
  [/\b\d{4}[\s-]?\d{4}[\s-]?\d{4}[\s-]?\d{4}\b/g, '[CC_REDACTED]'],
  [/\b[A-Z]{2}\d{2}[A-Z0-9]{11,30}\b/g, '[IBAN_REDACTED]'],
  [/\+?\d[\d\s\-().]{7,}\d/g, '[PHONE_REDACTED]'],
];

export function redactPII(input: string): string {
  return RULES.reduce((text, [pattern, mask]) => text.replace(pattern, mask), input);
}

/** Redacted, length-capped preview of user text for log lines */
export function previewText(input: string, maxLength = 80): string {
  const redacted = redactPII(input);
  return redacted.length > maxLength ? `${redacted.slice(0, maxLength)}…` : redacted;
}

function redactValue(value: unknown): unknown {
  if (typeof value === 'string') return redactPII(value);
  if (Array.isArray(value)) return value.map(redactValue);
  if (value !== null && typeof value === 'object') return redactObject(Object.fromEntries(Object.entries(value)));
  return value;
}

/** Deep copy with every string value redacted, arrays included */
export function redactObject(obj: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(obj).map(([key, value]) => [key, redactValue(value)]));
}
