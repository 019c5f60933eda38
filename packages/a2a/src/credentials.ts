/**
 * CredentialResolver: per-agent outbound header lookup.
 *
 * Keys are normalized agent URLs; lookup is an exact string match after
 * normalization. No prefix, wildcard or case-insensitive matching.
 */

import { ConfigValidationError } from "@parley/errors";
import type { HeaderSet } from "./types.js";
import { formatIssues, HeaderMapSchema, normalizeAgentUrl } from "./validation.js";

/** Shared empty header set for agents without configured credentials */
export const EMPTY_HEADERS: HeaderSet = Object.freeze({});

export class CredentialResolver {
  private readonly headers: ReadonlyMap<string, HeaderSet>;

  constructor(headerMap: Readonly<Record<string, Readonly<Record<string, string>>>> = {}) {
    const parsed = HeaderMapSchema.safeParse(headerMap);
    if (!parsed.success) {
      throw new ConfigValidationError("A2A credential", formatIssues(parsed.error));
    }

    const entries = new Map<string, HeaderSet>();
    const sources = new Map<string, string>();
    const invalid: string[] = [];
    for (const [url, set] of Object.entries(parsed.data)) {
      const key = normalizeAgentUrl(url);
      if (key === "") {
        invalid.push(`${url}: expected an http:// or https:// URL`);
        continue;
      }
      const earlier = sources.get(key);
      if (earlier !== undefined) {
        invalid.push(`${url}: same agent as ${earlier}`);
        continue;
      }
      sources.set(key, url);
      entries.set(key, Object.freeze({ ...set }));
    }
    if (invalid.length > 0) {
      throw new ConfigValidationError("A2A credential", invalid);
    }
    this.headers = entries;
  }

  /**
   * Headers to attach to requests for `url`. Returns the configured set for
   * an exact match and an empty set otherwise; never throws.
   */
  headersFor(url: string): HeaderSet {
    const key = normalizeAgentUrl(url);
    return this.headers.get(key) ?? EMPTY_HEADERS;
  }

  has(url: string): boolean {
    return this.headers.has(normalizeAgentUrl(url));
  }

  get size(): number {
    return this.headers.size;
  }
}
