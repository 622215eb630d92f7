import Sentiment from "sentiment";
import type { ITextClassifier, SentimentLabel } from "./ITextClassifier";

// Summed AFINN score at which a note counts as fully confident; one clearly polar word (+/-2) gives 0.5.
const FULL_CONFIDENCE_SCORE = 4;

export class LexiconClassifier implements ITextClassifier {
  readonly name = "lexicon";
  private readonly analyzer = new Sentiment();

  constructor(private readonly scale = 1) {}

  async classify(text: string): Promise<SentimentLabel> {
    const { score: total } = this.analyzer.analyze(text);
    const score = Math.min(1, (Math.abs(total) / FULL_CONFIDENCE_SCORE) * this.scale);
    if (total > 0) return { label: "positive", score };
    if (total < 0) return { label: "negative", score };
    return { label: "neutral", score: 0 };
  }
}
