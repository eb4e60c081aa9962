/**
 * Key derivation for the secondary indexes
 *
 * The same rules apply when indexing a record and when probing with a query,
 * so a query matches exactly the keys a record was filed under.
 */

/**
 * Separators ignored when comparing phone numbers
 */
const PHONE_SEPARATORS = /[\s\-.()]/g;

/**
 * Split a name into lowercase word tokens
 *
 * Tokens are maximal runs of non-whitespace; duplicates are removed while
 * preserving first-occurrence order.
 *
 * @example
 * tokenize("  Mary  Ann mary ") // ["mary", "ann"]
 */
export function tokenize(text: string): string[] {
  const tokens = text.toLowerCase().split(/\s+/).filter(Boolean);
  return [...new Set(tokens)];
}

/**
 * Normalize a phone number into its uniqueness key
 * Separators go, then one leading "+", so "+1 555..." and "1 555..." share a key.
 *
 * @example
 * normalizePhone(" +1 (555) 123-4567 ") // "15551234567"
 */
export function normalizePhone(phone: string): string {
  return phone.trim().replace(PHONE_SEPARATORS, "").replace(/^\+/, "");
}

/**
 * Normalize an email address into its uniqueness key
 */
export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}
