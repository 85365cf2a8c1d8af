/**
 * Event Bus for domain events raised by the registry and the dispatch handlers
 */

import { Event } from "../schemas/events.js";
import { EventEmitter } from "events";

type EventHandler = (event: Event) => void;

const DEFAULT_HISTORY_SIZE = 100;

export class EventBus {
  private emitter: EventEmitter;
  private connectionHandlers: Map<string, Set<EventHandler>>;
  private history: Event[];
  private readonly maxHistory: number;

  constructor(maxHistory: number = DEFAULT_HISTORY_SIZE) {
    this.emitter = new EventEmitter();
    this.emitter.setMaxListeners(100);
    this.connectionHandlers = new Map();
    this.history = [];
    this.maxHistory = maxHistory;
  }

  /**
   * Subscribe to events by type
   */
  on(eventType: Event["type"], handler: EventHandler): void {
    this.emitter.on(eventType, handler);
  }

  /**
   * Subscribe to events by type pattern, e.g. "vision.*"
   */
  onPattern(pattern: string, handler: EventHandler): () => void {
    const regex = new RegExp("^" + pattern.replace(/\*/g, ".*") + "$");
    const wrapped = (event: Event) => {
      if (regex.test(event.type)) {
        handler(event);
      }
    };
    this.emitter.on("*", wrapped);
    return () => this.emitter.off("*", wrapped);
  }

  /**
   * Subscribe to all events for one connection
   */
  onConnection(connectionId: string, handler: EventHandler): void {
    const wrappedHandler = (event: Event) => {
      if (event.connection_id === connectionId) {
        handler(event);
      }
    };

    let handlers = this.connectionHandlers.get(connectionId);
    if (!handlers) {
      handlers = new Set();
      this.connectionHandlers.set(connectionId, handlers);
    }
    handlers.add(wrappedHandler);

    this.emitter.on("*", wrappedHandler);
  }

  /**
   * Emit an event to type subscribers and wildcard subscribers
   */
  emit(event: Event): void {
    this.history.push(event);
    if (this.history.length > this.maxHistory) {
      this.history.shift();
    }

    this.emitter.emit(event.type, event);
    this.emitter.emit("*", event);
  }

  off(eventType: Event["type"], handler: EventHandler): void {
    this.emitter.off(eventType, handler);
  }

  /**
   * Remove all handlers registered for a connection
   */
  offConnection(connectionId: string): void {
    const handlers = this.connectionHandlers.get(connectionId);
    if (handlers) {
      for (const handler of handlers) {
        this.emitter.off("*", handler);
      }
      this.connectionHandlers.delete(connectionId);
    }
  }

  /**
   * Most recent events, oldest first
   */
  getRecentEvents(limit: number = 10): Event[] {
    if (limit <= 0) return [];
    return this.history.slice(-limit);
  }

  clearHistory(): void {
    this.history = [];
  }

  getListenerCount(eventType?: Event["type"]): number {
    if (eventType) {
      return this.emitter.listenerCount(eventType);
    }
    return this.emitter
      .eventNames()
      .reduce((total, name) => total + this.emitter.listenerCount(name), 0);
  }
}

export const eventBus = new EventBus();
