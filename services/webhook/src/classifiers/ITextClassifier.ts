import type { SentimentLabel } from "@sentigate/schemas";

export type { SentimentLabel };

/** Opaque text -> label/score model. */
export interface ITextClassifier {
  readonly name: string;
  classify(text: string): Promise<SentimentLabel>;
}

export class ClassifierError extends Error {
  constructor(message: string, readonly classifier: string) {
    super(message);
    this.name = "ClassifierError";
  }
}
