type PipelineEventType = "PIPELINE_TRANSITION" | "ANALYZER_DEGRADED" | "ANALYSIS_COMPLETED" | "ANALYSIS_FAILED";

export type PipelineEvent<T extends Record<string, unknown> = Record<string, unknown>> = {
  type: PipelineEventType;
  id: string;
  createdAt: string;
  payload: T;
  correlationId?: string;
};

type EventInput<T extends Record<string, unknown> = Record<string, unknown>> = {
  type: PipelineEventType;
  payload: T;
  correlationId?: string;
};

type EventHandler = (event: PipelineEvent) => void;

const handlers = new Set<EventHandler>();
const historyLimit = 500;
const history: PipelineEvent[] = [];
let sequence = 0;

function createEventId() {
  sequence += 1;
  return `e${Date.now().toString(36)}${sequence.toString(36).padStart(4, "0")}`;
}

export function publish<T extends Record<string, unknown> = Record<string, unknown>>(input: EventInput<T>): PipelineEvent<T> {
  const event: PipelineEvent<T> = {
    type: input.type,
    id: createEventId(),
    createdAt: new Date().toISOString(),
    payload: input.payload,
    correlationId: input.correlationId
  };

  history.push(event);
  if (history.length > historyLimit) history.shift();

  for (const handler of handlers) {
    try {
      handler(event);
    } catch (err) {
      console.error("event handler failed", { type: event.type, message: err instanceof Error ? err.message : String(err) });
    }
  }
  return event;
}

export function subscribe(handler: EventHandler) {
  handlers.add(handler);
  return () => {
    handlers.delete(handler);
  };
}

export function getEventsSince(lastEventId?: string) {
  if (!lastEventId) return [...history];
  const index = history.findIndex((event) => event.id === lastEventId);
  if (index < 0) return [...history];
  return history.slice(index + 1);
}
