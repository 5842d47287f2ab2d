import { GoogleGenerativeAI, type GenerationConfig } from "@google/generative-ai";

import { countTokens } from "../evaluation/metricsCalculator";
import type { GenerationSettings } from "./conversationLevels";

export interface GeminiResult {
  text: string;
  usage: {
    input_tokens: number;
    output_tokens: number;
  };
  model: string;
}

export interface TextModelClient {
  readonly model: string;
  generate(prompt: string, settings: GenerationSettings): Promise<GeminiResult>;
}

export class GeminiClient implements TextModelClient {
  private readonly genAI: GoogleGenerativeAI;
  private readonly modelName: string;

  constructor(apiKey: string, modelName: string) {
    this.genAI = new GoogleGenerativeAI(apiKey);
    this.modelName = modelName;
  }

  get model(): string {
    return this.modelName;
  }

  async generate(prompt: string, settings: GenerationSettings): Promise<GeminiResult> {
    const model = this.genAI.getGenerativeModel({ model: this.modelName });

    const generationConfig: GenerationConfig = {
      temperature: settings.temperature,
      maxOutputTokens: settings.max_output_tokens,
      topP: 0.9,
      topK: 40
    };

    const result = await model.generateContent({
      contents: [{ role: "user", parts: [{ text: prompt }] }],
      generationConfig
    });

    const response = result.response;
    const text = response.text();
    const usage = response.usageMetadata;

    return {
      text,
      usage: {
        input_tokens: usage?.promptTokenCount ?? countTokens(prompt),
        output_tokens: usage?.candidatesTokenCount ?? countTokens(text)
      },
      model: this.modelName
    };
  }
}

export const createGeminiClientFromEnv = (): GeminiClient => {
  const apiKey = process.env.GOOGLE_API_KEY;
  if (!apiKey) throw new Error("Missing GOOGLE_API_KEY");
  const modelName = process.env.GEMINI_MODEL || "gemini-1.5-flash";
  return new GeminiClient(apiKey, modelName);
};
