import { z } from "zod";
import { AnswerSynthesizer } from "./answer-synthesizer";
import { gate } from "./confidence-gate";
import type { Config } from "./config";
import { InvalidInputError, MissingFieldsError, NotFoundError } from "./errors";
import type { InjectionRecorder } from "./injection-recorder";
import { KeyedQueue } from "./keyed-queue";
import type { IndexRegistry } from "./registry";
import { mergeCandidates } from "./retrieval-merger";
import { resolveSlug, validateSlugParts } from "./slug";
import type { HealthReport, StatusManager } from "./status";
import type { ThreadStore } from "./thread-store";

const requiredText = z.string().min(1);
const metadataSchema = z.record(z.union([z.string(), z.number(), z.boolean()]));

export const answerRequestSchema = z.object({
  project: requiredText,
  version: requiredText,
  thread_slug: requiredText,
  message: requiredText,
});

export const elaborateRequestSchema = z.object({
  thread_slug: requiredText,
  message: requiredText,
});

export const injectRequestSchema = z.object({
  project: requiredText,
  version: requiredText,
  textContent: requiredText,
  metadata: metadataSchema.optional().default({}),
});

export interface TextResponse {
  textResponse: string;
}

export interface InjectResponse {
  status: "ok";
  id: string;
}

/**
 * Validate a request body. Absent, null or empty required fields become a
 * {@link MissingFieldsError}; any other mismatch an {@link InvalidInputError}.
 */
export function parseRequest<S extends z.ZodTypeAny>(schema: S, body: unknown): z.output<S> {
  const parsed = schema.safeParse(body ?? {});
  if (parsed.success) return parsed.data;
  const missing = new Set<string>();
  for (const issue of parsed.error.issues) {
    const absent =
      (issue.code === "invalid_type" && (issue.received === "undefined" || issue.received === "null")) ||
      (issue.code === "too_small" && issue.type === "string");
    if (absent && issue.path.length) missing.add(String(issue.path[0]));
  }
  if (missing.size) throw new MissingFieldsError([...missing]);
  const first = parsed.error.issues[0];
  throw new InvalidInputError(`${first?.path.join(".") || "body"}: ${first?.message ?? "invalid request"}`);
}

export interface RagServiceDeps {
  config: Config;
  registry: IndexRegistry;
  recorder: InjectionRecorder;
  threads: ThreadStore;
  synthesizer: AnswerSynthesizer;
  status: StatusManager;
}

/**
 * Request-level operations: answer, elaborate, inject, health. Holds no
 * module-level state; everything arrives through {@link RagServiceDeps}.
 */
export class RagService {
  private readonly deps: RagServiceDeps;
  private readonly threadLocks = new KeyedQueue();

  public constructor(deps: RagServiceDeps) {
    this.deps = deps;
  }

  /**
   * Retrieve from base + delta, gate, and answer or abstain. An unknown
   * project/version fails before any thread is touched.
   */
  public async answer(body: unknown): Promise<TextResponse> {
    const req = parseRequest(answerRequestSchema, body);
    validateSlugParts(req.project, req.version);
    const { config, registry, synthesizer } = this.deps;
    const slug = resolveSlug(req.project, req.version);
    const base = registry.getBase(slug);
    if (!base) throw new NotFoundError(req.project, req.version);

    const decision = await registry.withSlugLock(slug, async () => {
      const candidates = await mergeCandidates(
        base,
        registry.getDelta(slug),
        req.message,
        config.TOP_K,
        config.VERBOSE,
      );
      return gate(candidates, {
        minHits: config.MIN_HITS,
        similarityCutoff: config.SIMILARITY_CUTOFF,
        confidenceThreshold: config.CONFIDENCE_THRESHOLD,
      });
    });

    const mean = decision.meanScore === undefined ? "n/a" : decision.meanScore.toFixed(3);
    if (decision.shouldAnswer) {
      console.error(`[RAG] ${slug}: answering from ${decision.accepted.length} candidates (mean ${mean})`);
    } else {
      console.error(`[RAG] ${slug}: abstaining (${decision.reason}, ${decision.accepted.length} candidates, mean ${mean})`);
    }

    const textResponse = await synthesizer.synthesize(req.message, decision.accepted, decision.shouldAnswer);
    await this.threadLocks.run(req.thread_slug, () =>
      this.deps.threads.append(req.thread_slug, req.message, textResponse),
    );
    return { textResponse };
  }

  /** Retrieval-free reformatting over the thread's history. */
  public async elaborate(body: unknown): Promise<TextResponse> {
    const req = parseRequest(elaborateRequestSchema, body);
    const { threads, synthesizer } = this.deps;
    return this.threadLocks.run(req.thread_slug, async () => {
      const history = await threads.load(req.thread_slug);
      const textResponse = await synthesizer.elaborate(req.message, history);
      await threads.append(req.thread_slug, req.message, textResponse);
      return { textResponse };
    });
  }

  /**
   * Record, then index. The injection record is durable before the delta
   * index is touched, and the delta index is persisted before returning.
   */
  public async inject(body: unknown): Promise<InjectResponse> {
    const req = parseRequest(injectRequestSchema, body);
    validateSlugParts(req.project, req.version);
    const { registry, recorder } = this.deps;
    const slug = resolveSlug(req.project, req.version);
    return registry.withSlugLock<InjectResponse>(slug, async () => {
      const rec = await recorder.record(req.project, req.version, req.textContent, req.metadata);
      await registry.appendToDelta(slug, { id: rec.id, text: rec.text, metadata: rec.metadata });
      console.error(`[RAG] Injected ${rec.id} into ${slug}`);
      return { status: "ok", id: rec.id };
    });
  }

  public health(): HealthReport {
    const counts = this.deps.registry.counts();
    return {
      status: "ok",
      ...this.deps.status.getStatus(),
      baseIndexes: counts.base,
      deltaIndexes: counts.delta,
    };
  }
}
