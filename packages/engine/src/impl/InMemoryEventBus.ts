/**
 * @fileoverview In-Memory EventBus Implementation
 *
 * @module @plume/engine/impl/InMemoryEventBus
 */

import type { EventBus, EventFilter, EventHandler, EventPayload, Subscription } from "../contracts/EventBus.js";
import { consoleLogger, type Logger } from "../contracts/Logger.js";
import { describeError } from "../contracts/Errors.js";

/**
 * Default EventBus of the publishing engine.
 *
 * A handler that throws, or returns a promise that rejects, is logged and
 * never fails the build.
 */
export class InMemoryEventBus implements EventBus {
    private readonly handlers = new Map<EventFilter, Set<EventHandler>>();

    constructor(private readonly logger: Logger = consoleLogger) {}

    emit(event: EventPayload): void {
        this.dispatch(this.handlers.get(event.type), event);
        this.dispatch(this.handlers.get("*"), event);
    }

    subscribe(filter: EventFilter, handler: EventHandler): Subscription {
        const handlers = this.handlers.get(filter) ?? new Set<EventHandler>();
        handlers.add(handler);
        this.handlers.set(filter, handlers);

        return {
            unsubscribe: () => {
                handlers.delete(handler);
                if (handlers.size === 0 && this.handlers.get(filter) === handlers) {
                    this.handlers.delete(filter);
                }
            },
        };
    }

    private dispatch(handlers: Set<EventHandler> | undefined, event: EventPayload): void {
        // Copy: a handler may unsubscribe while we iterate.
        for (const handler of [...(handlers ?? [])]) {
            try {
                const result = handler(event);
                if (result instanceof Promise) {
                    result.catch((error: unknown) => this.reportHandlerError(event, error));
                }
            }
            catch (error) {
                this.reportHandlerError(event, error);
            }
        }
    }

    private reportHandlerError(event: EventPayload, error: unknown): void {
        this.logger.error("EventBus handler error", {
            eventType: event.type,
            error    : describeError(error),
        });
    }
}
