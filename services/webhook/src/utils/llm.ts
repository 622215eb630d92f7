import Anthropic from "@anthropic-ai/sdk";

/** Sends one user prompt and resolves with the reply's text. */
export type Completion = (prompt: string) => Promise<string>;

export type ClaudeOptions = {
  apiKey: string;
  model: string;
  timeoutMs: number;
};

export function createClaudeCompletion({ apiKey, model, timeoutMs }: ClaudeOptions): Completion {
  // No SDK-level retries: a failed classification fails the request.
  const client = new Anthropic({ apiKey, timeout: timeoutMs, maxRetries: 0 });
  return async (prompt) => {
    const res = await client.messages.create({
      model,
      max_tokens: 100,
      temperature: 0,
      messages: [{ role: "user", content: prompt }]
    });
    for (const block of res.content) {
      if (block.type === "text") return block.text;
    }
    return "";
  };
}

export function sentimentPrompt(text: string): string {
  return `
You are a financial sentiment classifier.

Given the trader's note:
"${text}"

Classify the sentiment as positive, negative, or neutral. Return this JSON format only:

{
  "label": "positive",
  "score": 0.9
}

"score" is your confidence in the label, between 0 and 1.
`;
}

/** Pulls the first {...} object out of a model reply. */
export function extractJson(reply: string): unknown {
  const m = reply.match(/\{[\s\S]*\}/);
  if (!m) return undefined;
  try {
    return JSON.parse(m[0]);
  } catch {
    return undefined;
  }
}
