import { SentimentLabel } from "@sentigate/schemas";
import { type Completion, extractJson, sentimentPrompt } from "../utils/llm";
import { ClassifierError, type ITextClassifier } from "./ITextClassifier";

export class ClaudeClassifier implements ITextClassifier {
  readonly name = "claude";

  constructor(private readonly complete: Completion) {}

  async classify(text: string): Promise<SentimentLabel> {
    const reply = await this.complete(sentimentPrompt(text));
    const parsed = SentimentLabel.safeParse(extractJson(reply));
    if (!parsed.success) {
      throw new ClassifierError(`unusable classifier reply: ${reply.slice(0, 200)}`, this.name);
    }
    return { label: parsed.data.label.toLowerCase(), score: parsed.data.score };
  }
}
