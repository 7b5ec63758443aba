/**
 * @fileoverview Implementation barrel exports
 *
 * Concrete implementations of engine contracts.
 *
 * @module @plume/engine/impl
 */

export { InMemoryEventBus } from "./InMemoryEventBus.js";
