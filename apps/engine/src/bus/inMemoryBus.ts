import type { Logger } from "@tiergate/shared";
import type { Bus, Topic, TopicPayloads } from "./bus.js";

type Handlers = { [K in Topic]: Set<(payload: TopicPayloads[K]) => void> };

export class InMemoryBus implements Bus {
  private handlers: Handlers = {
    CONSENSUS: new Set(),
    APPROVALS: new Set(),
    VERDICTS: new Set(),
  };

  constructor(private log?: Logger) {}

  // A failing subscriber never reaches the publisher.
  publish<K extends Topic>(topic: K, payload: TopicPayloads[K]): void {
    for (const h of this.handlers[topic]) {
      try {
        h(payload);
      } catch (e) {
        this.log?.error(`${topic} subscriber failed`, e);
      }
    }
  }

  subscribe<K extends Topic>(topic: K, handler: (payload: TopicPayloads[K]) => void): () => void {
    this.handlers[topic].add(handler);
    return () => this.handlers[topic].delete(handler);
  }
}
