import type { NodeId, Vec2 } from "../types/graph";

export type GraphEvent =
  | { type: "Pan"; delta: Vec2; newPan: Vec2 }
  | { type: "Zoom"; delta: number }
  | { type: "NodeMove"; id: NodeId; delta: Vec2 }
  | { type: "NodeDragStart"; id: NodeId }
  | { type: "NodeDragEnd"; id: NodeId }
  | { type: "NodeSelect"; id: NodeId }
  | { type: "NodeDeselect"; id: NodeId }
  | { type: "NodeClick"; id: NodeId }
  | { type: "NodeDoubleClick"; id: NodeId };

export type GraphEventType = GraphEvent["type"];

/** Outbound side of an event channel. `send` must not block. */
export interface EventSender {
  send(event: GraphEvent): void;
}

/** Unbounded in-memory queue, read with `drain`. */
export class EventChannel implements EventSender {
  private queue: GraphEvent[] = [];

  send(event: GraphEvent): void {
    this.queue.push(event);
  }

  drain(): GraphEvent[] {
    const events = this.queue;
    this.queue = [];
    return events;
  }

  get size(): number {
    return this.queue.length;
  }
}

export function callbackSender(callback: (event: GraphEvent) => void): EventSender {
  return { send: callback };
}

/** Forwards to the optional sender; without one events are dropped. */
export class EventPublisher {
  constructor(private readonly sender?: EventSender) {}

  publish(event: GraphEvent): void {
    this.sender?.send(event);
  }
}
