/**
 * String form of a value thrown inside a script.
 * Values from another realm fail `instanceof Error`, so only String() is relied on.
 */
export function describeThrown(value: unknown): string {
  try {
    return String(value);
  } catch {
    return "[unprintable exception]";
  }
}
