/**
 * Context retriever: nearest past replies for a query, expanded to their
 * surrounding exchanges and rendered as one block for the prompt.
 */

import { projectEmbedding } from "./embeddings.js";
import { type EmbeddingFailure, fail, type Result, toEmbeddingFailure } from "./errors.js";
import { formatTimestamp, roleLabel } from "./format.js";
import { createLogger } from "./logger.js";
import { sanitizeContent, truncateContent } from "./sanitize.js";
import type { MessageLog } from "./storage/message-log.js";
import type { SettingsStore } from "./storage/settings-store.js";
import type { VectorMatch, VectorStore } from "./storage/vector-store.js";
import type { ChatMessage, ContextMemoryConfig, EmbeddingProvider } from "./types.js";

const log = createLogger("retriever");

export const CLUSTER_SEPARATOR = "--- context skip ---";

export interface RetrievedCluster {
  /** Chronological */
  messages: ChatMessage[];
  anchors: VectorMatch[];
}

export type RetrievalResult =
  | { status: "ok"; block: string; matches: VectorMatch[]; clusters: RetrievedCluster[] }
  | { status: "no_match"; block: "" }
  | { status: "query_too_short"; block: "" }
  | { status: "embedding_unavailable"; block: ""; error: EmbeddingFailure };

export interface RetrievalOptions {
  /** Ids that must not be anchors, typically the ones already in the window */
  excludeIds?: Iterable<number>;
  topK?: number;
  padding?: number;
}

export interface ContextRetrieverDeps {
  messages: MessageLog;
  vectors: VectorStore;
  settings: SettingsStore;
  embedder: EmbeddingProvider;
  config: Pick<ContextMemoryConfig, "embedding" | "retrieval" | "window">;
}

/**
 * Union id groups until no two share an id. Output groups are sorted
 * ascending and ordered by their first id.
 */
export function mergeNeighborhoods(groups: ReadonlyArray<readonly number[]>): number[][] {
  const clusters = groups.filter((g) => g.length > 0).map((g) => new Set(g));

  let merged = true;
  while (merged) {
    merged = false;
    outer: for (let i = 0; i < clusters.length; i++) {
      for (let j = i + 1; j < clusters.length; j++) {
        if ([...clusters[j]].some((id) => clusters[i].has(id))) {
          for (const id of clusters[j]) clusters[i].add(id);
          clusters.splice(j, 1);
          merged = true;
          break outer;
        }
      }
    }
  }

  return clusters.map((c) => [...c].sort((a, b) => a - b)).sort((a, b) => a[0] - b[0]);
}

export class ContextRetriever {
  constructor(private readonly deps: ContextRetrieverDeps) {}

  async search(chatId: string, queryText: string, options: RetrievalOptions = {}): Promise<RetrievalResult> {
    const query = sanitizeContent(queryText);
    if (query.length < this.deps.config.retrieval.minQueryChars) {
      return { status: "query_too_short", block: "" };
    }

    const embedded = await this.embedQuery(query);
    if (!embedded.ok) {
      log.warn(`Query embedding failed for chat ${chatId}: ${embedded.error.message}`);
      return { status: "embedding_unavailable", block: "", error: embedded.error };
    }

    const settings = await this.deps.settings.load();
    const topK = options.topK ?? settings.retrievalTopK;
    const padding = options.padding ?? settings.neighborhoodPadding;

    const matches = await this.deps.vectors.search(chatId, embedded.value, {
      topK,
      maxDistance: settings.maxDistance,
      excludeIds: new Set(options.excludeIds ?? []),
    });
    if (matches.length === 0) return { status: "no_match", block: "" };

    const neighborhoods = await Promise.all(
      matches.map((match) => this.deps.messages.neighborIds(chatId, match.messageId, padding)),
    );
    const groups = mergeNeighborhoods(neighborhoods);

    const fetched = await this.deps.messages.getMany(chatId, groups.flat());
    const byId = new Map(fetched.map((m) => [m.id, m]));

    const clusters: RetrievedCluster[] = groups.map((ids) => {
      const members = new Set(ids);
      return {
        messages: ids.flatMap((id) => byId.get(id) ?? []),
        anchors: matches.filter((match) => members.has(match.messageId)),
      };
    });

    log.debug(`Retrieved ${matches.length} anchors in ${clusters.length} clusters for chat ${chatId}`);
    return { status: "ok", block: this.render(clusters), matches, clusters };
  }

  async searchBlock(chatId: string, queryText: string, options: RetrievalOptions = {}): Promise<string> {
    return (await this.search(chatId, queryText, options)).block;
  }

  render(clusters: readonly RetrievedCluster[]): string {
    const truncate = {
      maxChars: this.deps.config.window.maxMessageChars,
      headRatio: this.deps.config.window.headRatio,
      tailRatio: this.deps.config.window.tailRatio,
    };

    const sections = clusters.map((cluster) => {
      const distances = new Map(cluster.anchors.map((a) => [a.messageId, a.distance]));
      return cluster.messages
        .map((m) => {
          const distance = distances.get(m.id);
          const flag = distance === undefined ? "" : ` (match, distance ${distance.toFixed(3)})`;
          const content = truncateContent(sanitizeContent(m.content), truncate);
          return `[${formatTimestamp(m.createdAt)}] ${roleLabel(m.role)}${flag}: ${content}`;
        })
        .join("\n");
    });

    return `<retrieved-context>\n${sections.join(`\n${CLUSTER_SEPARATOR}\n`)}\n</retrieved-context>`;
  }

  private async embedQuery(query: string): Promise<Result<number[], EmbeddingFailure>> {
    const { embedder } = this.deps;
    const { dimensions, allowTruncation } = this.deps.config.embedding;
    try {
      const raw = await embedder.embedQuery(query);
      return projectEmbedding(raw, dimensions, embedder.truncatable || allowTruncation);
    } catch (err) {
      return fail(toEmbeddingFailure(err));
    }
  }
}
