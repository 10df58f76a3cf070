import { describe, it, expect } from "vitest";
import {
  ABSTAIN_RESPONSE,
  AnswerSynthesizer,
  buildAnswerPrompt,
  buildContext,
  buildElaboratePrompt,
} from "../answer-synthesizer";
import { GenerationError } from "../errors";
import { FakeGenerator, candidate } from "./helpers";

describe("buildContext", () => {
  it("joins chunk texts with a blank line, in order", () => {
    expect(buildContext([candidate("A", 0.9), candidate("B", 0.8)])).toBe("A\n\nB");
  });
});

describe("AnswerSynthesizer.synthesize", () => {
  it("returns the abstention string without calling the generator", async () => {
    const gen = new FakeGenerator();
    const s = new AnswerSynthesizer({ generator: gen });
    const out = await s.synthesize("what is a pod?", [candidate("A", 0.9)], false);
    expect(out).toBe("I don't know.");
    expect(out).toBe(ABSTAIN_RESPONSE);
    expect(gen.prompts).toHaveLength(0);
  });

  it("generates once from the grounding prompt and returns the raw output", async () => {
    const gen = new FakeGenerator("  raw model text\n");
    const s = new AnswerSynthesizer({ generator: gen, domain: "Helm" });
    const out = await s.synthesize("what is a chart?", [candidate("A", 0.9), candidate("B")], true);

    expect(out).toBe("  raw model text\n");
    expect(gen.prompts).toHaveLength(1);
    expect(gen.prompts[0].temperature).toBe(0);
    expect(gen.prompts[0].prompt).toBe(buildAnswerPrompt("what is a chart?", "A\n\nB", "Helm"));
    expect(gen.prompts[0].prompt.endsWith("Context:\nA\n\nB\n\nQuestion: what is a chart?\n\nAnswer:")).toBe(true);
  });

  it("passes the configured temperature", async () => {
    const gen = new FakeGenerator();
    await new AnswerSynthesizer({ generator: gen, temperature: 0.4 }).synthesize("q", [candidate("A", 1)], true);
    expect(gen.prompts[0].temperature).toBe(0.4);
  });

  it("propagates generator failures instead of abstaining", async () => {
    const gen = new FakeGenerator();
    gen.failWith = new GenerationError("quota exceeded");
    const s = new AnswerSynthesizer({ generator: gen });
    await expect(s.synthesize("q", [candidate("A", 1)], true)).rejects.toBeInstanceOf(GenerationError);
  });
});

describe("buildAnswerPrompt", () => {
  it("names the domain and the abstention phrase", () => {
    const p = buildAnswerPrompt("q", "ctx", "Kubernetes");
    expect(p.startsWith("You are a helpful technical assistant with expertise in Kubernetes.\n")).toBe(true);
    expect(p).toContain('respond with: "I don\'t know."');
  });
});

describe("buildElaboratePrompt", () => {
  it("omits the conversation block for an empty thread", () => {
    expect(buildElaboratePrompt("raw notes", [])).toBe(
      "Please take the following content and reformat it in a clear, readable, and well-organized way. " +
        "Summarize key points, improve structure, and make it easier to understand:\n\nraw notes\n\nReformatted version:",
    );
  });

  it("prefixes prior turns as role: content lines", () => {
    const p = buildElaboratePrompt("raw notes", [
      { role: "user", content: "hi" },
      { role: "assistant", content: "hello" },
    ]);
    expect(p.startsWith("Previous conversation:\nuser: hi\nassistant: hello\n\nPlease take")).toBe(true);
  });

  it("is what elaborate sends to the generator", async () => {
    const gen = new FakeGenerator("tidy");
    const out = await new AnswerSynthesizer({ generator: gen }).elaborate("raw", []);
    expect(out).toBe("tidy");
    expect(gen.prompts[0].prompt).toBe(buildElaboratePrompt("raw", []));
  });
});
