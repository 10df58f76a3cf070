import { GoogleGenerativeAI } from "@google/generative-ai";
import { GenerationError } from "./errors";

/** Text generation capability consumed by the answer synthesizer. */
export interface Generator {
  generate(prompt: string, temperature: number): Promise<string>;
}

export interface GeminiGeneratorOptions {
  apiKey: string;
  modelName: string;
  /** Hard upper bound per call; expiry surfaces as a GenerationError. */
  timeoutMs: number;
}

/** Gemini-backed {@link Generator}. */
export class GeminiGenerator implements Generator {
  private readonly client: GoogleGenerativeAI;
  private readonly modelName: string;
  private readonly timeoutMs: number;

  public constructor(opts: GeminiGeneratorOptions) {
    this.client = new GoogleGenerativeAI(opts.apiKey);
    this.modelName = opts.modelName;
    this.timeoutMs = opts.timeoutMs;
  }

  public async generate(prompt: string, temperature: number): Promise<string> {
    const model = this.client.getGenerativeModel(
      { model: this.modelName, generationConfig: { temperature } },
      { timeout: this.timeoutMs },
    );
    try {
      const result = await model.generateContent(prompt);
      return result.response.text();
    } catch (e) {
      throw new GenerationError(`Generation failed (${this.modelName})`, e);
    }
  }
}
