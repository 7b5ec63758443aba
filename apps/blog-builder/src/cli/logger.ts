import { consoleLogger, type Logger } from "@plume/engine";

/**
 * Console logger for the command line. Debug output only with --verbose.
 */
export function createCliLogger(verbose: boolean): Logger {
    return {
        ...consoleLogger,
        debug: verbose ? consoleLogger.debug : () => undefined,
    };
}
