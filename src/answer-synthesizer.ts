import type { Generator } from "./generation";
import type { RetrievedCandidate, Thread } from "./types";

/** Returned verbatim on abstention; also the phrase the model is told to use. */
export const ABSTAIN_RESPONSE = "I don't know.";

export interface AnswerSynthesizerOptions {
  generator: Generator;
  temperature?: number;
  /** Expertise named in the answer prompt. */
  domain?: string;
}

/** Accepted chunk texts, in merger order, separated by a blank line. */
export function buildContext(accepted: readonly RetrievedCandidate[]): string {
  return accepted.map((c) => c.chunk.text).join("\n\n");
}

export function buildAnswerPrompt(question: string, context: string, domain: string): string {
  return `You are a helpful technical assistant with expertise in ${domain}.

Use the provided context as your PRIMARY source of information. When the user asks for examples or configurations:
1. Start with what's provided in the context
2. Use your knowledge to complete and enhance the example to make it fully functional
3. Ensure all parts of your example are consistent (matching labels, IPs, names, etc.)
4. Provide complete, working configurations that the user can directly use

If the context doesn't contain relevant information to answer the question at all, respond with: "${ABSTAIN_RESPONSE}"

Context:
${context}

Question: ${question}

Answer:`;
}

const REFORMAT_INSTRUCTION =
  "Please take the following content and reformat it in a clear, readable, and well-organized way. " +
  "Summarize key points, improve structure, and make it easier to understand:";

/** Retrieval-free prompt: prior turns as `role: content` lines, then the reformat request. */
export function buildElaboratePrompt(message: string, history: Thread): string {
  const conversation = history.map((m) => `${m.role}: ${m.content}`).join("\n");
  const body = `${REFORMAT_INSTRUCTION}\n\n${message}\n\nReformatted version:`;
  return conversation ? `Previous conversation:\n${conversation}\n\n${body}` : body;
}

/**
 * Turns a gate decision into response text. Generator failures propagate
 * unchanged so callers can tell an outage from an abstention.
 */
export class AnswerSynthesizer {
  private readonly generator: Generator;
  private readonly temperature: number;
  private readonly domain: string;

  public constructor(opts: AnswerSynthesizerOptions) {
    this.generator = opts.generator;
    this.temperature = opts.temperature ?? 0;
    this.domain = opts.domain ?? "Kubernetes and cloud-native technologies";
  }

  public async synthesize(
    question: string,
    accepted: readonly RetrievedCandidate[],
    shouldAnswer: boolean,
  ): Promise<string> {
    if (!shouldAnswer) return ABSTAIN_RESPONSE;
    const prompt = buildAnswerPrompt(question, buildContext(accepted), this.domain);
    return this.generator.generate(prompt, this.temperature);
  }

  public async elaborate(message: string, history: Thread): Promise<string> {
    return this.generator.generate(buildElaboratePrompt(message, history), this.temperature);
  }
}
