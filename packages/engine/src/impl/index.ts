/**
 * @fileoverview Implementation barrel exports
 *
 * Concrete implementations of engine contracts.
 *
 * @module @slant/engine/impl
 */

export { InMemoryEventBus, type HandlerErrorCallback } from "./InMemoryEventBus.js";
