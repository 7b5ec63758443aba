/**
 * @fileoverview Emitter Loader
 *
 * Loads user artifact emitters from code files (.js/.mjs) that export
 * ArtifactEmitter objects, either named, as the default export, or as a
 * default-exported array.
 *
 * @module @plume/engine/plugins/EmitterLoader
 */

import { existsSync, readdirSync, statSync } from "node:fs";
import { extname, join, resolve } from "node:path";
import { pathToFileURL } from "node:url";
import type { ArtifactEmitter } from "../contracts/ArtifactEmitter.js";
import { isArtifactEmitter } from "../contracts/ArtifactEmitter.js";
import { describeError } from "../contracts/Errors.js";
import { consoleLogger, createScopedLogger, type Logger } from "../contracts/Logger.js";

const CODE_EXTENSIONS = new Set([".js", ".mjs"]);

/**
 * Emitter loader configuration.
 */
export interface EmitterLoaderConfig {
    /** Logger for emitter loading */
    logger?: Logger;
}

/**
 * Module namespace as returned by a dynamic import.
 */
type ModuleNamespace = Record<string, unknown>;

/**
 * Collect the emitters a module namespace exports.
 */
export function collectEmitters(moduleExports: ModuleNamespace): ArtifactEmitter[] {
    const found: ArtifactEmitter[] = [];

    for (const [key, exported] of Object.entries(moduleExports)) {
        if (key === "default" && Array.isArray(exported)) {
            found.push(...exported.filter(isArtifactEmitter));
        }
        else if (isArtifactEmitter(exported) && !found.includes(exported)) {
            found.push(exported);
        }
    }

    return found;
}

/**
 * Emitter Loader
 *
 * @example
 * ```typescript
 * const loader = new EmitterLoader();
 * const emitters = await loader.loadFromDirectory("./user/emitters");
 *
 * for (const emitter of emitters) {
 *     engine.registerEmitter(emitter);
 * }
 * ```
 */
export class EmitterLoader {
    private readonly logger: Logger;

    constructor(config: EmitterLoaderConfig = {}) {
        this.logger = createScopedLogger(config.logger ?? consoleLogger, "EmitterLoader");
    }

    /**
     * Load every emitter from the code files of a directory.
     *
     * A missing directory yields no emitters. A file that fails to load is
     * logged and skipped.
     *
     * @param dirPath - Path to the emitters directory
     */
    async loadFromDirectory(dirPath: string): Promise<ArtifactEmitter[]> {
        if (!existsSync(dirPath)) {
            this.logger.debug("Emitter directory does not exist", { dirPath });
            return [];
        }

        if (!statSync(dirPath).isDirectory()) {
            this.logger.warn("Emitter path is not a directory", { dirPath });
            return [];
        }

        const emitters: ArtifactEmitter[] = [];
        const files = readdirSync(dirPath).sort();

        for (const file of files) {
            if (!CODE_EXTENSIONS.has(extname(file).toLowerCase())) {
                continue;
            }

            const filePath = join(dirPath, file);
            try {
                emitters.push(...(await this.loadCodeFile(filePath)));
            }
            catch (error) {
                this.logger.error("Failed to load emitter file", {
                    filePath,
                    error: describeError(error),
                });
            }
        }

        this.logger.info("Emitters loaded from directory", {
            dirPath,
            emitters: emitters.length,
        });

        return emitters;
    }

    /**
     * Load the emitters exported by one code file.
     *
     * @param filePath - Path to a .js/.mjs file
     */
    async loadCodeFile(filePath: string): Promise<ArtifactEmitter[]> {
        const moduleExports: ModuleNamespace = await import(pathToFileURL(resolve(filePath)).href);
        const emitters = collectEmitters(moduleExports);

        for (const emitter of emitters) {
            this.logger.debug("Loaded emitter", { id: emitter.id, filePath });
        }

        return emitters;
    }
}
