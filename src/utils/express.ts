/**
 * Express 5 types `req.params.*` as `string | string[]` to cover wildcard
 * segments. Every route here uses plain `:name` segments, so take the first.
 */
export function param(val: string | string[]): string {
  return Array.isArray(val) ? val[0] : val;
}

/** First string value of a query parameter, or undefined for absent/nested values. */
export function queryString(val: unknown): string | undefined {
  if (typeof val === "string") return val;
  if (Array.isArray(val) && typeof val[0] === "string") return val[0];
  return undefined;
}
