/**
 * @fileoverview Build runner
 *
 * Resolves the configuration, runs the publishing engine and writes the
 * artifacts. Returns the process exit code.
 *
 * @module build
 */

import { join, resolve } from "path";
import {
    BuildFailedError,
    EmitterLoader,
    PublishingEngine,
    createDefaultEmitters,
    type BuildConfigInput,
    type BuildResult,
    type EventPayload,
    type Logger,
} from "@plume/engine";
import type { CliOptions } from "./cli/program.js";
import { createCliLogger } from "./cli/logger.js";
import { applyEnvOverrides, loadSiteConfigWithFallback, type SiteConfig } from "./config/index.js";
import { writeArtifacts } from "./output/writeArtifacts.js";

/**
 * Runner dependencies.
 */
export interface RunBuildDeps {
    /** Application root: holds config/site.yml and user/emitters */
    appRoot: string;

    /** Logger (default: console, debug only with --verbose) */
    logger?: Logger;

    /** Environment (default: process.env) */
    env?: NodeJS.ProcessEnv;
}

/**
 * Resolved settings for one build.
 */
export interface BuildSettings {
    input: BuildConfigInput;
    outputDir: string;
    emittersDir: string;
}

/**
 * Merge site.yml (already overlaid by the environment) with command line options.
 */
export function resolveBuildSettings(site: SiteConfig, options: CliOptions, appRoot: string): BuildSettings {
    const input: BuildConfigInput = {
        contentDir  : resolve(options.content ?? site.contentDir),
        baseUrl     : options.baseUrl ?? site.baseUrl,
        title       : site.title,
        preview     : options.drafts ?? site.buildDrafts ?? false,
        buildFuture : options.future ?? site.buildFuture ?? true,
        buildExpired: options.expired ?? site.buildExpired ?? true,
        ...(site.description !== undefined ? { description: site.description } : {}),
        ...(site.languageCode !== undefined ? { languageCode: site.languageCode } : {}),
        ...(site.extensions !== undefined ? { extensions: site.extensions } : {}),
        ...(site.trailingSlash !== undefined ? { trailingSlash: site.trailingSlash } : {}),
        ...(site.feedLimit !== undefined ? { feedLimit: site.feedLimit } : {}),
        ...(site.concurrency !== undefined && site.concurrency > 0 ? { concurrency: site.concurrency } : {}),
        ...(site.params !== undefined ? { params: site.params } : {}),
    };

    return {
        input,
        outputDir  : resolve(options.out ?? site.outputDir),
        emittersDir: resolve(options.emitters ?? site.emittersDir ?? join(appRoot, "user", "emitters")),
    };
}

/**
 * Print engine events.
 */
function subscribeToEvents(engine: PublishingEngine, logger: Logger): void {
    const data = (event: EventPayload): Record<string, unknown> => event.data ?? {};

    engine.eventBus.subscribe("build:scanned", (event) => {
        const { scanned, parsed, failed } = data(event);
        logger.info(`Scanned ${String(scanned)} files: ${String(parsed)} parsed, ${String(failed)} failed`);
    });

    engine.eventBus.subscribe("document:parsed", (event) => {
        const { sourcePath, route } = data(event);
        logger.debug(`${String(sourcePath)} -> ${String(route)}`);
    });

    engine.eventBus.subscribe("artifact:emitted", (event) => {
        const { emitterId, path } = data(event);
        logger.debug(`${String(emitterId)} emitted ${String(path)}`);
    });
}

function reportFailures(result: BuildResult, logger: Logger): void {
    for (const failure of result.failures) {
        logger.warn(failure.error.message, { code: failure.error.code });
    }
}

/**
 * Run a build from command line options.
 *
 * @returns 0 on success, 1 on a failed build
 */
export async function runBuild(options: CliOptions, deps: RunBuildDeps): Promise<number> {
    const logger = deps.logger ?? createCliLogger(options.verbose ?? false);
    const configPath = options.config ?? join(deps.appRoot, "config", "site.yml");

    const site = applyEnvOverrides(loadSiteConfigWithFallback(configPath, logger), deps.env ?? process.env);
    const settings = resolveBuildSettings(site, options, deps.appRoot);

    const userEmitters = await new EmitterLoader({ logger }).loadFromDirectory(settings.emittersDir);
    const engine = new PublishingEngine({
        logger,
        emitters: [...createDefaultEmitters(), ...userEmitters],
    });
    subscribeToEvents(engine, logger);

    let result: BuildResult;
    try {
        result = await engine.build(settings.input);
    }
    catch (error) {
        if (!(error instanceof BuildFailedError)) {
            throw error;
        }
        for (const item of error.errors) {
            logger.error(item.message, { code: item.code });
        }
        logger.error(error.message);
        return 1;
    }

    reportFailures(result, logger);

    const written = await writeArtifacts(settings.outputDir, result.artifacts);
    logger.info(`Published ${result.stats.published} documents, wrote ${written.length} files to ${settings.outputDir}`, {
        excluded: result.stats.excluded,
        failed  : result.stats.failed,
    });

    return 0;
}
