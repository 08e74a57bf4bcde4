import { EventEmitter } from "events";
import { Phase, PhaseStatus, Violation } from "../types";
import { createModuleLogger } from "../utils/logger";

const log = createModuleLogger("events");

export type PhaseEventType = "phase.status" | "phase.evaluated";

export type PhaseEvent = {
  type: PhaseEventType;
  featureNumber: number;
  featureKey: string;
  phase: Phase;
  status: PhaseStatus;
  iteration: number;
  violations?: Violation[];
};

export type PhaseEventHandler = (event: PhaseEvent) => void;

export type PhaseSubscription = {
  id: string;
  unsubscribe: () => boolean;
};

const CHANNEL = "phase";

/**
 * In-process delivery of phase events to presentation layers. Handlers run
 * synchronously in subscription order; a failing handler is logged and never
 * reaches the workflow.
 */
export class PhaseEventBus {
  private readonly emitter = new EventEmitter();
  private readonly handlers = new Map<string, (event: PhaseEvent) => void>();
  private sequence = 0;

  constructor() {
    this.emitter.setMaxListeners(100);
  }

  publish(event: PhaseEvent): void {
    this.emitter.emit(CHANNEL, event);
  }

  subscribe(handler: PhaseEventHandler): PhaseSubscription {
    this.sequence += 1;
    const id = `subscription:${this.sequence}`;
    const wrapped = (event: PhaseEvent): void => {
      try {
        handler(event);
      } catch (error) {
        log.error({ err: error, subscription: id, phase: event.phase }, "phase event handler failed");
      }
    };
    this.emitter.on(CHANNEL, wrapped);
    this.handlers.set(id, wrapped);
    return { id, unsubscribe: () => this.unsubscribe(id) };
  }

  unsubscribe(id: string): boolean {
    const wrapped = this.handlers.get(id);
    if (!wrapped) {
      return false;
    }
    this.emitter.removeListener(CHANNEL, wrapped);
    this.handlers.delete(id);
    return true;
  }

  subscriptionCount(): number {
    return this.handlers.size;
  }

  clear(): void {
    this.emitter.removeAllListeners(CHANNEL);
    this.handlers.clear();
  }
}
