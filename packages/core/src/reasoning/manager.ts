import type { DatabaseConnection } from "../db/connection.js";
import { getAllSettings } from "../db/schema.js";
import { LlmReasoningService } from "./llm.js";
import type { LlmProvider } from "./llm.js";
import type { ReasoningService } from "./types.js";

let service: ReasoningService | null = null;
/** Connection whose settings built the service; null for one set explicitly. */
let serviceDb: DatabaseConnection | null = null;

function providerFrom(raw: string | undefined): LlmProvider {
  return raw === "openai" ? "openai" : "anthropic";
}

/**
 * Process-wide reasoning service, built from the `ai.*` settings on first use
 * and again when a different connection asks for it.
 */
export function getReasoningService(db: DatabaseConnection): ReasoningService {
  if (service && (serviceDb === null || serviceDb === db)) return service;

  const settings = getAllSettings(db);
  const timeoutMs = Number.parseInt(settings["ai.timeout_ms"] ?? "", 10);
  service = new LlmReasoningService({
    apiKey: settings["ai.api_key"] ?? "",
    provider: providerFrom(settings["ai.provider"]),
    model: settings["ai.model"] || undefined,
    timeoutMs: Number.isFinite(timeoutMs) && timeoutMs > 0 ? timeoutMs : undefined,
  });
  serviceDb = db;
  return service;
}

export function setReasoningService(s: ReasoningService): void {
  service = s;
  serviceDb = null;
}

export function resetReasoningService(): void {
  service = null;
  serviceDb = null;
}
