/**
 * @fileoverview Engine barrel exports
 *
 * @module @plume/engine/engine
 */

export {
    PublishingEngine,
    type BuildResult,
    type BuildStats,
    type DocumentFailure,
    type EngineConfig,
} from "./PublishingEngine.js";
