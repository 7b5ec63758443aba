/**
 * @fileoverview Emitter loader barrel exports
 *
 * @module @plume/engine/plugins
 */

export {
    EmitterLoader,
    collectEmitters,
    type EmitterLoaderConfig,
} from "./EmitterLoader.js";
