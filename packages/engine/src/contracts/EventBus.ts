/**
 * @fileoverview Build events
 *
 * The engine reports progress through an EventBus so that a CLI, a watcher
 * or a test can follow a build without the engine knowing about any of them.
 * Dispatch is synchronous: a subscriber sees `document:parsed` for a file
 * before the engine pulls the next one.
 *
 * @module @plume/engine/contracts/EventBus
 */

/**
 * Every event a build emits, in the order a successful build emits them.
 * `document:*` and `artifact:emitted` repeat; `build:failed` replaces
 * whatever would have followed it.
 */
export type BuildEventType =
    | "build:starting"
    | "build:scanned"
    | "document:parsed"
    | "document:failed"
    | "build:assembled"
    | "artifact:emitted"
    | "build:completed"
    | "build:failed";

/**
 * An event type, or "*" for all of them.
 */
export type EventFilter = BuildEventType | "*";

export interface EventPayload {
    readonly type: BuildEventType;

    /** ISO-8601 emission time */
    readonly timestamp: string;

    /** Trace ID of the build that emitted the event */
    readonly traceId?: string;

    readonly data?: Record<string, unknown>;
}

export type EventHandler = (event: EventPayload) => void | Promise<void>;

export interface Subscription {
    unsubscribe(): void;
}

/**
 * Channel between the engine and whoever watches a build.
 *
 * @example
 * ```typescript
 * const sub = engine.eventBus.subscribe("document:failed", (event) => {
 *     console.warn(`${String(event.data?.sourcePath)} skipped`);
 * });
 * await engine.build(input);
 * sub.unsubscribe();
 * ```
 */
export interface EventBus {
    emit(event: EventPayload): void;

    /**
     * Handlers for a type run before "*" handlers, each in subscription order.
     */
    subscribe(filter: EventFilter, handler: EventHandler): Subscription;
}

/**
 * Stamp a build event with the current time.
 */
export function createEvent(
    type: BuildEventType,
    data?: Record<string, unknown>,
    traceId?: string
): EventPayload {
    return {
        type,
        timestamp: new Date().toISOString(),
        traceId,
        data,
    };
}
