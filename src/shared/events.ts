/**
 * Domain event definitions for event-driven architecture
 * All events follow Discriminated Union pattern
 */

import type { TaskStatus } from '../domains/test-execution/types.ts';
import type { TestStatus } from '../domains/test-registry/types.ts';

// Application Control Domain Events
export type ApplicationEvent =
  | { type: 'app:initialized'; command: string; timestamp: number }
  | { type: 'app:shutdown-started'; reason: string; timestamp: number }
  | {
    type: 'app:error-trapped';
    error: Error;
    severity: 'fatal' | 'recoverable';
    timestamp: number;
  };

// Dispatch events, one cycle per named test
export type DispatchEvent =
  | {
    type: 'dispatch:started';
    testName: string;
    packages: number;
    workers: number;
    timestamp: number;
  }
  | { type: 'task:started'; pkg: string; timestamp: number }
  | {
    type: 'task:completed';
    pkg: string;
    status: TaskStatus;
    duration: number;
    timestamp: number;
  }
  | {
    type: 'dispatch:completed';
    testName: string;
    results: number;
    passed: boolean;
    timestamp: number;
  };

// Named test lifecycle
export type RunEvent =
  | { type: 'test:started'; testName: string; timestamp: number }
  | { type: 'test:completed'; testName: string; status: TestStatus; timestamp: number };

// Environment Control Domain Events
export type EnvironmentEvent =
  | { type: 'env:workdir-created'; testName: string; workDir: string; timestamp: number }
  | { type: 'env:cleanup-complete'; testName: string; errors: number; timestamp: number };

// Union of all domain events
export type DomainEvent =
  | ApplicationEvent
  | DispatchEvent
  | RunEvent
  | EnvironmentEvent;

/**
 * Event handler type
 */
export type EventHandler<T extends DomainEvent> = (event: T) => Promise<void> | void;

/**
 * Event bus interface
 */
export interface EventBus {
  emit<T extends DomainEvent>(event: T): Promise<void>;
  on<T extends DomainEvent>(
    eventType: T['type'],
    handler: EventHandler<T>,
  ): () => void; // Returns unsubscribe function
  off<T extends DomainEvent>(
    eventType: T['type'],
    handler: EventHandler<T>,
  ): void;
}

/**
 * Simple event bus implementation
 */
export class SimpleEventBus implements EventBus {
  private handlers = new Map<string, Set<EventHandler<DomainEvent>>>();

  async emit<T extends DomainEvent>(event: T): Promise<void> {
    const handlers = this.handlers.get(event.type);
    if (!handlers) return;

    const promises = Array.from(handlers).map((handler) =>
      Promise.resolve(handler(event)).catch((error) =>
        console.error(`Event handler error for ${event.type}:`, error)
      )
    );

    await Promise.all(promises);
  }

  on<T extends DomainEvent>(
    eventType: T['type'],
    handler: EventHandler<T>,
  ): () => void {
    let handlers = this.handlers.get(eventType);
    if (!handlers) {
      handlers = new Set();
      this.handlers.set(eventType, handlers);
    }

    handlers.add(handler as EventHandler<DomainEvent>);

    return () => this.off(eventType, handler);
  }

  off<T extends DomainEvent>(
    eventType: T['type'],
    handler: EventHandler<T>,
  ): void {
    const handlers = this.handlers.get(eventType);
    if (handlers) {
      handlers.delete(handler as EventHandler<DomainEvent>);
      if (handlers.size === 0) {
        this.handlers.delete(eventType);
      }
    }
  }
}

/**
 * Create event with timestamp
 */
export const createEvent = <T extends Omit<DomainEvent, 'timestamp'>>(
  event: T,
): T & { timestamp: number } => ({
  ...event,
  timestamp: Date.now(),
});
