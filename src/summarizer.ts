/**
 * Summary provider over an OpenAI-compatible chat completions endpoint, and
 * rendering of the buffer text it folds into a chat's profile.
 */

import { z } from "zod";
import { SummarizationFailedError } from "./errors.js";
import type { FetchLike } from "./embeddings.js";
import { roleLabel } from "./format.js";
import { errorMessage } from "./logger.js";
import { type TruncateOptions, truncateContent } from "./sanitize.js";
import type { ChatMessage, ContextMemoryConfig, SummaryProvider } from "./types.js";

const DEFAULT_OPENAI_BASE_URL = "https://api.openai.com/v1";

const SYSTEM_PROMPT = [
  "You maintain a long-term profile of a conversation partner.",
  "Merge the new conversation excerpt into the existing profile.",
  "Keep durable facts, preferences, ongoing topics and commitments; drop small talk.",
  "Reply with the updated profile only.",
].join(" ");

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() }),
      }),
    )
    .min(1),
});

/** Buffer messages as `Role: content` lines, oversized content truncated. */
export function renderBuffer(messages: readonly ChatMessage[], truncate: TruncateOptions): string {
  return messages.map((m) => `${roleLabel(m.role)}: ${truncateContent(m.content, truncate)}`).join("\n");
}

export function buildSummaryPrompt(previousProfile: string, bufferText: string): string {
  const profile = previousProfile.trim() || "(empty)";
  return `Existing profile:\n${profile}\n\nNew conversation excerpt:\n${bufferText}`;
}

export function createOpenAiSummaryProvider(
  config: ContextMemoryConfig["summary"],
  fetchImpl: FetchLike = fetch,
): SummaryProvider {
  const baseUrl = (config.baseUrl || DEFAULT_OPENAI_BASE_URL).replace(/\/$/, "");
  const url = `${baseUrl}/chat/completions`;

  return {
    id: "openai",
    summarize: async (previousProfile, bufferText) => {
      const apiKey = config.apiKey || process.env.OPENAI_API_KEY?.trim();
      if (!apiKey) {
        throw new SummarizationFailedError("No API key found for summarization. Set OPENAI_API_KEY.");
      }

      const controller = new AbortController();
      const timer = setTimeout(() => controller.abort(), config.timeoutMs);
      let res: Response;
      try {
        res = await fetchImpl(url, {
          method: "POST",
          headers: { "Content-Type": "application/json", Authorization: `Bearer ${apiKey}` },
          body: JSON.stringify({
            model: config.model,
            temperature: config.temperature,
            messages: [
              { role: "system", content: SYSTEM_PROMPT },
              { role: "user", content: buildSummaryPrompt(previousProfile, bufferText) },
            ],
          }),
          signal: controller.signal,
        });
      } catch (err) {
        const reason = controller.signal.aborted ? `timed out after ${config.timeoutMs}ms` : errorMessage(err);
        throw new SummarizationFailedError(`Summary request failed: ${reason}`, { cause: err });
      } finally {
        clearTimeout(timer);
      }

      if (!res.ok) {
        const text = await res.text().catch(() => "");
        throw new SummarizationFailedError(`Summary request failed: ${res.status} ${text}`.trim());
      }

      const parsed = completionSchema.safeParse(await res.json().catch(() => undefined));
      if (!parsed.success) {
        throw new SummarizationFailedError("Summary response had an unexpected shape", { cause: parsed.error });
      }
      const content = parsed.data.choices[0].message.content?.trim();
      if (!content) {
        throw new SummarizationFailedError("Summary response was empty");
      }
      return content;
    },
  };
}
