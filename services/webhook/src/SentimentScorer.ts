import type { ITextClassifier } from "./classifiers";
import { truncateChars } from "./utils/text";

export const SCORER_MAX_CHARS = 500;

export interface TextScorer {
  score(text: string): Promise<number>;
}

/**
 * Maps a note to a signed sentiment in [-1, 1]: positive labels keep the
 * classifier's score, negative labels flip it, anything else is 0.
 * Classifier failures are not caught here.
 */
export class SentimentScorer implements TextScorer {
  constructor(private readonly classifier: ITextClassifier) {}

  async score(text: string): Promise<number> {
    if (!text || !text.trim()) return 0;
    const { label, score } = await this.classifier.classify(truncateChars(text, SCORER_MAX_CHARS));
    const l = label.toLowerCase();
    const magnitude = Math.min(1, Math.max(0, score));
    if (l.includes("positive")) return magnitude;
    if (l.includes("negative")) return -magnitude;
    return 0;
  }
}
