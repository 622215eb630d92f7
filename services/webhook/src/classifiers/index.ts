import type { SentimentConfig } from "../config";
import { createClaudeCompletion } from "../utils/llm";
import { ClaudeClassifier } from "./ClaudeClassifier";
import type { ITextClassifier } from "./ITextClassifier";
import { LexiconClassifier } from "./LexiconClassifier";

export function createClassifier(cfg: SentimentConfig): ITextClassifier {
  if (cfg.provider === "claude") {
    return new ClaudeClassifier(createClaudeCompletion({ apiKey: cfg.anthropicApiKey, model: cfg.model, timeoutMs: cfg.timeoutMs }));
  }
  return new LexiconClassifier(cfg.lexiconScale);
}

export { ClassifierError } from "./ITextClassifier";
export type { ITextClassifier } from "./ITextClassifier";
