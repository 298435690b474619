import type { JsonObject } from "../core/json.js";

export type EventLevel = "info" | "warn" | "error";

export interface SweepEvent {
  ts: string;
  level: EventLevel;
  kind: string;
  message: string;
  data: JsonObject | null;
}

/** Observability sink handed to each component; nothing logs through a global. */
export interface EventSink {
  event(kind: string, message: string, data?: JsonObject | null, level?: EventLevel): void;
}

/** One JSON line per event on stderr (stdout stays free for tool output and the MCP transport). */
export class ConsoleEventSink implements EventSink {
  constructor(private readonly context: JsonObject = {}) {}

  event(kind: string, message: string, data: JsonObject | null = null, level: EventLevel = "info"): void {
    const line = JSON.stringify({ ts: new Date().toISOString(), level, kind, message, ...this.context, data });
    console.error(line);
  }

  child(context: JsonObject): ConsoleEventSink {
    return new ConsoleEventSink({ ...this.context, ...context });
  }
}

export class RecordingEventSink implements EventSink {
  readonly events: SweepEvent[] = [];

  event(kind: string, message: string, data: JsonObject | null = null, level: EventLevel = "info"): void {
    this.events.push({ ts: new Date().toISOString(), level, kind, message, data });
  }

  ofKind(kind: string): SweepEvent[] {
    return this.events.filter((e) => e.kind === kind);
  }
}

export const silentEventSink: EventSink = {
  event(): void {}
};
