import type { Logger } from "../observability/logger";
import type { StepName } from "./schema";
import type {
  ResumeToken,
  SessionId,
  SuspensionPrompt,
  TerminalOutcome,
} from "./types";

export type EngineEvent =
  | { type: "session.started"; sessionId: SessionId; at: string }
  | {
      type: "step.completed";
      sessionId: SessionId;
      step: StepName;
      result: "continue" | "suspend";
      at: string;
    }
  | {
      type: "session.waiting";
      sessionId: SessionId;
      token: ResumeToken;
      prompt: SuspensionPrompt;
      at: string;
    }
  | { type: "session.resumed"; sessionId: SessionId; at: string }
  | {
      type: "session.terminal";
      sessionId: SessionId;
      outcome: TerminalOutcome;
      at: string;
    }
  | {
      type: "session.cancelled";
      sessionId: SessionId;
      reason: string;
      at: string;
    };

export type EngineEventType = EngineEvent["type"];

type Listener<T extends EngineEventType> = (
  event: Extract<EngineEvent, { type: T }>,
) => void;

type AnyListener = (event: EngineEvent) => void;

export class EventBus {
  private readonly listeners = new Map<EngineEventType | "*", AnyListener[]>();

  constructor(private readonly logger: Logger) {}

  /** Returns a function that removes the listener again. */
  on<T extends EngineEventType>(type: T, listener: Listener<T>): () => void {
    return this.add(type, (event) => {
      if (isEventOf(type, event)) {
        listener(event);
      }
    });
  }

  onAny(listener: AnyListener): () => void {
    return this.add("*", listener);
  }

  emit(event: EngineEvent): void {
    const targets = [
      ...(this.listeners.get(event.type) ?? []),
      ...(this.listeners.get("*") ?? []),
    ];
    for (const listener of targets) {
      try {
        listener(event);
      } catch (error) {
        this.logger.warn(
          { err: error, event: event.type, sessionId: event.sessionId },
          "event listener failed",
        );
      }
    }
  }

  private add(key: EngineEventType | "*", listener: AnyListener): () => void {
    const list = this.listeners.get(key) ?? [];
    list.push(listener);
    this.listeners.set(key, list);
    return () => {
      const current = this.listeners.get(key) ?? [];
      this.listeners.set(
        key,
        current.filter((entry) => entry !== listener),
      );
    };
  }
}

const isEventOf = <T extends EngineEventType>(
  type: T,
  event: EngineEvent,
): event is Extract<EngineEvent, { type: T }> => event.type === type;
