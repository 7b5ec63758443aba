/**
 * @fileoverview Site Configuration Loader
 *
 * Loads the site configuration from a YAML file and applies environment
 * overrides.
 *
 * Precedence: defaults < site.yml < environment < command line.
 *
 * @module config/loadSiteConfig
 */

import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import type { Logger } from "@plume/engine";

/**
 * Site configuration as read from site.yml.
 */
export interface SiteConfig {
    title: string;
    baseUrl: string;
    description?: string;
    languageCode?: string;

    /** Content tree, relative to the working directory */
    contentDir: string;

    /** Publish directory, relative to the working directory */
    outputDir: string;

    /** Directory of user emitter modules */
    emittersDir?: string;

    extensions?: string[];
    trailingSlash?: boolean;
    feedLimit?: number;
    concurrency?: number;
    buildDrafts?: boolean;
    buildFuture?: boolean;
    buildExpired?: boolean;
    params?: Record<string, unknown>;
}

const STRING_FIELDS = ["title", "baseUrl", "description", "languageCode", "contentDir", "outputDir", "emittersDir"] as const;
const BOOLEAN_FIELDS = ["trailingSlash", "buildDrafts", "buildFuture", "buildExpired"] as const;
const NUMBER_FIELDS = ["feedLimit", "concurrency"] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Load the site configuration from a YAML file.
 *
 * Fields missing from the file keep their default value.
 *
 * @param filePath - Path to site.yml
 * @returns Site configuration
 * @throws Error if the file doesn't exist or is invalid
 *
 * @example
 * ```typescript
 * const config = loadSiteConfig("./config/site.yml");
 * console.log(config.baseUrl); // "https://example.org/"
 * ```
 */
export function loadSiteConfig(filePath: string): SiteConfig {
    if (!existsSync(filePath)) {
        throw new Error(`Site configuration file not found: ${filePath}`);
    }

    const content = readFileSync(filePath, "utf-8");
    const parsed: unknown = parseYaml(content);

    if (!isRecord(parsed)) {
        throw new Error("Invalid site configuration: expected a mapping");
    }

    const config = getDefaultSiteConfig();

    for (const field of STRING_FIELDS) {
        const value = parsed[field];
        if (value === undefined || value === null) {
            continue;
        }
        if (typeof value !== "string" || value.trim() === "") {
            throw new Error(`Invalid site configuration: '${field}' must be a non-empty string`);
        }
        config[field] = value;
    }

    for (const field of BOOLEAN_FIELDS) {
        const value = parsed[field];
        if (value === undefined || value === null) {
            continue;
        }
        if (typeof value !== "boolean") {
            throw new Error(`Invalid site configuration: '${field}' must be true or false`);
        }
        config[field] = value;
    }

    for (const field of NUMBER_FIELDS) {
        const value = parsed[field];
        if (value === undefined || value === null) {
            continue;
        }
        if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
            throw new Error(`Invalid site configuration: '${field}' must be a non-negative integer`);
        }
        config[field] = value;
    }

    if (parsed.extensions !== undefined && parsed.extensions !== null) {
        const { extensions } = parsed;
        if (!Array.isArray(extensions) || !extensions.every((ext): ext is string => typeof ext === "string")) {
            throw new Error("Invalid site configuration: 'extensions' must be a list of strings");
        }
        config.extensions = extensions;
    }

    if (parsed.params !== undefined && parsed.params !== null) {
        if (!isRecord(parsed.params)) {
            throw new Error("Invalid site configuration: 'params' must be a mapping");
        }
        config.params = parsed.params;
    }

    return config;
}

/**
 * Load the site configuration with fallback to the defaults.
 *
 * @param filePath - Path to site.yml
 * @param logger - Receives the reason for a fallback
 */
export function loadSiteConfigWithFallback(filePath: string, logger: Logger): SiteConfig {
    try {
        return loadSiteConfig(filePath);
    }
    catch (error) {
        logger.warn(`Failed to load site configuration from ${filePath}`, {
            error: error instanceof Error ? error.message : String(error),
        });
        return getDefaultSiteConfig();
    }
}

/**
 * Get the default site configuration.
 */
export function getDefaultSiteConfig(): SiteConfig {
    return {
        title     : "My Plume Site",
        baseUrl   : "http://localhost:1313/",
        contentDir: "content",
        outputDir : "public",
    };
}

function parseFlag(value: string): boolean {
    return value === "true" || value === "1";
}

/**
 * Apply PLUME_* environment variables over a configuration.
 *
 * @param config - Configuration from defaults and site.yml
 * @param env - Environment (default: process.env)
 * @returns A new configuration
 */
export function applyEnvOverrides(config: SiteConfig, env: NodeJS.ProcessEnv = process.env): SiteConfig {
    const next: SiteConfig = { ...config };

    if (env.PLUME_BASE_URL) {
        next.baseUrl = env.PLUME_BASE_URL;
    }
    if (env.PLUME_CONTENT_DIR) {
        next.contentDir = env.PLUME_CONTENT_DIR;
    }
    if (env.PLUME_OUTPUT_DIR) {
        next.outputDir = env.PLUME_OUTPUT_DIR;
    }
    if (env.PLUME_BUILD_DRAFTS) {
        next.buildDrafts = parseFlag(env.PLUME_BUILD_DRAFTS);
    }

    return next;
}
