import { nanoid } from "nanoid";
import type { AdapterPool } from "../adapters/adapter-pool";
import type { TextExtractor } from "../adapters/types";
import type { Logger } from "../observability/logger";
import type { ParsedInput } from "./input";
import { ExtractionSchema, type InfoRequest, type SessionState } from "./schema";
import {
  type StateUpdate,
  completeAlert,
  errorEntry,
  mergeUpdate,
  message,
} from "./state-record";
import type { SessionId } from "./types";

export interface IngestDeps {
  sessionId: SessionId;
  pool: AdapterPool;
  extractor?: TextExtractor;
  extractionConfidenceThreshold: number;
  logger: Logger;
  now: () => string;
}

export interface IngestResult {
  state: SessionState;
  /** True when alert, symptoms or context changed. */
  newFacts: boolean;
}

const FACT_FIELDS = ["alertInfo", "symptoms", "context"] as const;

const factsIn = (update: StateUpdate): string[] =>
  FACT_FIELDS.filter((field) => update[field] !== undefined);

const clarificationFor = (problems: string[]): InfoRequest => ({
  id: `req-${nanoid(10)}`,
  field: "clarification",
  reason: `could not use the input: ${problems.join("; ")}`,
  requestedBy: "input",
});

/**
 * Folds operator input into the record: the text as one operator message,
 * whatever the extractor recognises in it, and any structured fields.
 * Input that cannot be used becomes an InvalidInput error plus a
 * clarification request, never an exception.
 */
export const ingestInput = async (
  state: SessionState,
  parsed: ParsedInput,
  origin: "seed" | "resume",
  deps: IngestDeps,
): Promise<IngestResult> => {
  let current = state;
  let newFacts = false;

  const apply = (update: StateUpdate): void => {
    const merged = mergeUpdate(current, update, origin, deps.now());
    if (factsIn(update).some((field) => !merged.rejected.includes(field))) {
      newFacts = true;
    }
    current = merged.state;
  };

  if (parsed.text !== undefined) {
    apply({ conversation: [message("operator", parsed.text, deps.now())] });

    if (deps.extractor) {
      apply(await extractFacts(parsed.text, deps.extractor, deps));
    }
  }

  apply(parsed.update);

  if (parsed.problems.length > 0) {
    const now = deps.now();
    current = mergeUpdate(
      current,
      {
        errors: parsed.problems.map((problem) =>
          errorEntry("InvalidInput", origin, problem, now),
        ),
        pendingCollection: [
          ...(current.pendingCollection ?? []),
          clarificationFor(parsed.problems),
        ],
      },
      origin,
      now,
    ).state;
  }

  return { state: current, newFacts };
};

const extractFacts = async (
  text: string,
  extractor: TextExtractor,
  deps: IngestDeps,
): Promise<StateUpdate> => {
  const outcome = await deps.pool.invoke("extractor", ExtractionSchema, (signal) =>
    extractor.extract(text, { sessionId: deps.sessionId, signal }),
  );

  if (!outcome.ok) {
    return {
      errors: [
        errorEntry("AdapterFailure", "extractor", outcome.error.message, deps.now()),
      ],
    };
  }

  const extraction = outcome.value;
  if (extraction.confidence < deps.extractionConfidenceThreshold) {
    deps.logger.debug(
      { confidence: extraction.confidence },
      "extraction below threshold; keeping text only",
    );
    return {};
  }

  return {
    ...(extraction.alertInfo
      ? { alertInfo: completeAlert(extraction.alertInfo, "extractor", deps.now()) }
      : {}),
    ...(extraction.symptoms ? { symptoms: extraction.symptoms } : {}),
    ...(extraction.context ? { context: extraction.context } : {}),
  };
};
