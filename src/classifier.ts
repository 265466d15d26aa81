import { z } from "zod";

import { TransportError, toError } from "./errors.js";

export type Classification = {
  approved: boolean;
  confidence: number;
  reason: string;
};

// Classifier judges whether submitted media shows the supervised action; failures throw TransportError.
export interface Classifier {
  readonly id: string;
  classify(bytes: Uint8Array, contentType: string): Promise<Classification>;
}

const classificationSchema = z.object({
  approved: z.boolean(),
  confidence: z.number().min(0).max(1),
  reason: z.string().default(""),
});

export interface HttpClassifierOptions {
  url: string;
  apiKey: string | null;
  timeoutMs: number;
}

// Posts the media as base64 JSON and expects {approved, confidence, reason} back.
export class HttpClassifier implements Classifier {
  readonly id = "classifier";

  constructor(private readonly options: HttpClassifierOptions) {}

  async classify(bytes: Uint8Array, contentType: string): Promise<Classification> {
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (this.options.apiKey) headers["Authorization"] = `Bearer ${this.options.apiKey}`;

    let response: Response;
    try {
      response = await fetch(this.options.url, {
        method: "POST",
        headers,
        body: JSON.stringify({ content_type: contentType, data: Buffer.from(bytes).toString("base64") }),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error) {
      throw new TransportError(`Classifier unreachable: ${toError(error).message}`, toError(error));
    }

    if (!response.ok) {
      throw new TransportError(`Classifier failed with HTTP ${response.status}`);
    }

    const parsed = classificationSchema.safeParse(await response.json().catch(() => null));
    if (!parsed.success) {
      throw new TransportError(`Classifier returned an unreadable verdict: ${parsed.error.issues[0]?.message ?? "invalid body"}`);
    }
    return parsed.data;
  }
}
