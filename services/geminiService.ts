import { GoogleGenAI } from "@google/genai";
import type { ComposedPrompt, WorksheetGenerator } from "../types";
import { APP_PREFIX } from "../constants";
import { GenerationError } from "./errors";

export interface GeminiOptions {
  apiKey: string;
  model: string;
  temperature?: number;
}

/**
 * Returns a configured GoogleGenAI instance.
 * A missing key is only reported here; the request itself will fail per student.
 */
function getAIClient(apiKey: string) {
  if (!apiKey) {
    console.warn(`${APP_PREFIX} No API key detected. Worksheet generation will fail for every student.`);
  }
  return new GoogleGenAI({ apiKey });
}

export function createGeminiGenerator(options: GeminiOptions): WorksheetGenerator {
  const ai = getAIClient(options.apiKey);

  return {
    async generate(prompt: ComposedPrompt): Promise<string> {
      const response = await ai.models.generateContent({
        model: options.model,
        contents: prompt.taskInstruction,
        config: {
          systemInstruction: prompt.roleInstruction,
          temperature: options.temperature ?? 0.7
        }
      });

      const text = response.text?.trim();
      if (!text) {
        throw new GenerationError(`Model ${options.model} returned an empty response`);
      }
      return text;
    }
  };
}
