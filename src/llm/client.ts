import OpenAI from "openai";
import type { ModelConfig } from "../config/env";
import type { StageName } from "../types";

export interface CompletionRequest {
  stage: StageName;
  system: string;
  prompt: string;
  format: "text" | "json";
  signal?: AbortSignal;
}

export interface ModelClient {
  complete(request: CompletionRequest): Promise<string>;
}

const MAX_TOKENS: Record<StageName, number> = {
  router: 16,
  vetter: 1200,
  auditor: 900
};

export function createOpenAIModelClient(config: ModelConfig): ModelClient {
  const openai = new OpenAI({ apiKey: config.apiKey, maxRetries: 0 });
  const models: Record<StageName, string> = {
    router: config.routerModel,
    vetter: config.vetterModel,
    auditor: config.auditorModel
  };

  return {
    async complete({ stage, system, prompt, format, signal }: CompletionRequest): Promise<string> {
      const response = await openai.chat.completions.create(
        {
          model: models[stage],
          temperature: stage === "router" ? 0 : 0.2,
          max_tokens: MAX_TOKENS[stage],
          ...(format === "json" ? { response_format: { type: "json_object" as const } } : {}),
          messages: [
            { role: "system", content: system },
            { role: "user", content: prompt }
          ]
        },
        { signal }
      );

      const content = response.choices[0]?.message?.content;
      if (!content) {
        throw new Error("Model returned empty response");
      }
      return content;
    }
  };
}
