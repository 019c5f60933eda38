/**
 * In-memory registry of discovered Agent Cards.
 *
 * - Keyed by normalized agent URL
 * - Listing follows first-insertion order (an overwrite keeps its slot)
 * - No TTL and no eviction; entries live until clear()
 */

import { InvalidAgentUrlError } from "@parley/errors";
import type { AgentCardFetcher } from "./agent-card-fetcher.js";
import type { CredentialResolver } from "./credentials.js";
import type { AgentCard, RegistryEntry } from "./types.js";
import { DEFAULT_TIMEOUT_MS } from "./types.js";
import { normalizeAgentUrl } from "./validation.js";

export interface AgentRegistryConfig {
  readonly fetcher: AgentCardFetcher;
  readonly credentials: CredentialResolver;
  readonly timeoutMs?: number | undefined;
}

export interface DiscoverOptions {
  /** Fetch even when a card is cached, replacing it on success */
  readonly refresh?: boolean | undefined;
  readonly signal?: AbortSignal | undefined;
}

export class AgentRegistry {
  private readonly entries: Map<string, AgentCard> = new Map();
  private readonly fetcher: AgentCardFetcher;
  private readonly credentials: CredentialResolver;
  private readonly timeoutMs: number;

  constructor(config: AgentRegistryConfig) {
    this.fetcher = config.fetcher;
    this.credentials = config.credentials;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  get(url: string): AgentCard | undefined {
    return this.entries.get(normalizeAgentUrl(url));
  }

  /**
   * Store a card, replacing any previous one for the same URL.
   */
  put(url: string, card: AgentCard): void {
    const key = normalizeAgentUrl(url);
    if (key === "") {
      throw new InvalidAgentUrlError(url);
    }
    this.entries.set(key, card);
  }

  has(url: string): boolean {
    return this.entries.has(normalizeAgentUrl(url));
  }

  /** Snapshot of every entry in insertion order */
  list(): readonly RegistryEntry[] {
    return [...this.entries].map(([url, card]) => ({ url, card }));
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }

  /**
   * Return the cached card for `url`, fetching and caching it when absent
   * (or when `refresh` is set). A failed fetch leaves the registry as it
   * was and rethrows.
   *
   * Two concurrent calls for the same unseen URL both fetch; the later
   * result wins.
   */
  async discoverOrFetch(url: string, options: DiscoverOptions = {}): Promise<AgentCard> {
    const key = normalizeAgentUrl(url);
    if (key === "") {
      throw new InvalidAgentUrlError(url);
    }

    if (options.refresh !== true) {
      const cached = this.entries.get(key);
      if (cached !== undefined) return cached;
    }

    const card = await this.fetcher.fetch(
      key,
      this.credentials.headersFor(key),
      this.timeoutMs,
      options.signal,
    );
    this.entries.set(key, card);
    return card;
  }
}
