import { createHmac } from "crypto";

/** HMAC-SHA256 request signing for the 3Commas public API. */
export class Signer {
  constructor(private readonly secret: string) {}

  sign(canonicalQuery: string): string {
    return createHmac("sha256", this.secret).update(canonicalQuery, "utf8").digest("hex");
  }
}

/** Sorted `key=value&key=value`, for endpoints that sign their parameters. */
export function canonicalQuery(params: Record<string, string | number | boolean>): string {
  return Object.keys(params)
    .sort()
    .map((k) => `${encodeURIComponent(k)}=${encodeURIComponent(String(params[k]))}`)
    .join("&");
}
