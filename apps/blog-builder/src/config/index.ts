/**
 * @fileoverview Configuration barrel exports
 *
 * @module config
 */

export {
    loadSiteConfig,
    loadSiteConfigWithFallback,
    getDefaultSiteConfig,
    applyEnvOverrides,
    type SiteConfig,
} from "./loadSiteConfig.js";
