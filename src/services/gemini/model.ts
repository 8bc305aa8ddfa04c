/**
 * Generative model boundary
 *
 * The summarizer only needs "prompt in, JSON text out". GenAiModel backs that
 * with the Gemini API; tests substitute an in-process fake.
 */

import { GoogleGenAI } from '@google/genai';

import { withTimeout } from '../../utils/sleep.js';

export interface GenerateRequest {
  prompt: string;
  timeoutMs: number;
}

export interface GenerativeModel {
  readonly name: string;
  /** Raw response text; parsing is the caller's job */
  generate(request: GenerateRequest): Promise<string>;
}

export interface GenAiModelOptions {
  apiKey: string;
  model: string;
  temperature: number;
  maxOutputTokens: number;
}

export class GenAiModel implements GenerativeModel {
  readonly name: string;
  private readonly ai: GoogleGenAI;

  constructor(private readonly options: GenAiModelOptions) {
    this.name = options.model;
    this.ai = new GoogleGenAI({ apiKey: options.apiKey });
  }

  async generate(request: GenerateRequest): Promise<string> {
    const response = await withTimeout(
      this.ai.models.generateContent({
        model: this.options.model,
        contents: request.prompt,
        config: {
          temperature: this.options.temperature,
          maxOutputTokens: this.options.maxOutputTokens,
          responseMimeType: 'application/json',
          httpOptions: { timeout: request.timeoutMs },
        },
      }),
      // Outer guard in case the SDK retries internally past its own timeout
      request.timeoutMs + 5_000,
      `Gemini request timed out after ${request.timeoutMs}ms`
    );

    return response.text ?? '';
  }
}
