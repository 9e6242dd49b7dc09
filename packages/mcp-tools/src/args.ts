/**
 * Read an optional tool argument as a string.
 * Absent and null mean "use the default"; other non-strings are stringified
 * so that validation sees and rejects them.
 */
export function optionalString(value: unknown): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  return typeof value === 'string' ? value : String(value);
}
