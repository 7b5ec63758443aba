/**
 * @fileoverview Route Resolver
 *
 * Pure mapping from a document's source path to its route.
 *
 * Rules:
 * - The content-root prefix and the file extension are stripped
 * - `index` and `_index` files resolve to their containing directory
 * - `[name]` segments are single parameters, `[...name]` a trailing catch-all
 *
 * Parameterized routes are templates. The resolver validates and exposes
 * them; binding them to concrete values is the request router's job.
 *
 * @module @plume/engine/routing/RouteResolver
 */

import { extname } from "node:path";
import type { BuildConfig } from "../contracts/BuildConfig.js";
import { createRoute, type Route, type RouteSegment } from "../contracts/Route.js";
import { InvalidRouteError } from "../contracts/Errors.js";

/**
 * Options for route resolution.
 */
export interface ResolveRouteOptions {
    /** Content root to strip when the source path starts with it */
    readonly contentRoot?: string;
}

const INDEX_NAMES = new Set(["index", "_index"]);
const PARAMETER_NAME = /^[A-Za-z_$][\w$-]*$/;

/**
 * Normalize separators and drop empty and "." segments.
 */
function toSegments(path: string): string[] {
    return path
        .replace(/\\/g, "/")
        .split("/")
        .filter((segment) => segment.length > 0 && segment !== ".");
}

/**
 * Remove the content-root prefix from a path when present.
 */
function stripContentRoot(sourcePath: string, contentRoot: string | undefined): string[] {
    const segments = toSegments(sourcePath);
    if (!contentRoot) {
        return segments;
    }

    const rootSegments = toSegments(contentRoot);
    const hasPrefix =
        rootSegments.length <= segments.length &&
        rootSegments.every((segment, index) => segments[index] === segment);

    return hasPrefix ? segments.slice(rootSegments.length) : segments;
}

/**
 * Parse one path segment into its tagged form.
 *
 * @param raw - Segment text, e.g. "posts", "[slug]", "[...path]"
 * @param sourcePath - Used in errors
 * @throws InvalidRouteError on malformed placeholders
 */
export function parseSegment(raw: string, sourcePath: string): RouteSegment {
    const opens = raw.includes("[");
    const closes = raw.includes("]");

    if (!opens && !closes) {
        return { kind: "literal", value: raw };
    }

    if (!raw.startsWith("[") || !raw.endsWith("]") || raw.indexOf("[", 1) !== -1 || raw.indexOf("]") !== raw.length - 1) {
        throw new InvalidRouteError(sourcePath, raw, "placeholder must span the whole segment");
    }

    const inner = raw.slice(1, -1);
    const catchAll = inner.startsWith("...");
    const name = catchAll ? inner.slice(3) : inner;

    if (!PARAMETER_NAME.test(name)) {
        throw new InvalidRouteError(sourcePath, raw, "parameter name must be an identifier");
    }

    return catchAll ? { kind: "catchAll", name } : { kind: "param", name };
}

/**
 * Resolve a document's route.
 *
 * @param sourcePath - Path of the document, relative to the content root or prefixed by it
 * @param options - Content root to strip
 * @returns Route for the document
 * @throws InvalidRouteError if a placeholder segment is malformed
 *
 * @example
 * ```typescript
 * resolveRoute("posts/index.md").path;      // "/posts"
 * resolveRoute("posts/hello.md").path;      // "/posts/hello"
 * resolveRoute("docs/[...slug].md").parameters; // ["slug"]
 * ```
 */
export function resolveRoute(sourcePath: string, options: ResolveRouteOptions = {}): Route {
    const rawSegments = stripContentRoot(sourcePath, options.contentRoot);
    const fileName = rawSegments.pop();

    if (fileName !== undefined) {
        const stem = fileName.slice(0, fileName.length - extname(fileName).length);
        if (!INDEX_NAMES.has(stem)) {
            rawSegments.push(stem);
        }
    }

    const segments = rawSegments.map((raw) => parseSegment(raw, sourcePath));
    const seen = new Set<string>();

    segments.forEach((segment, index) => {
        if (segment.kind === "literal") {
            return;
        }
        if (segment.kind === "catchAll" && index !== segments.length - 1) {
            throw new InvalidRouteError(sourcePath, `[...${segment.name}]`, "catch-all must be the last segment");
        }
        if (seen.has(segment.name)) {
            throw new InvalidRouteError(sourcePath, rawSegments[index], `duplicate parameter "${segment.name}"`);
        }
        seen.add(segment.name);
    });

    return createRoute(segments);
}

/**
 * Absolute URL of a concrete route.
 *
 * @param route - Resolved route
 * @param config - Base URL and trailing-slash setting
 * @returns Permalink, or null for a parameterized route
 *
 * @example
 * ```typescript
 * routeToPermalink(resolveRoute("posts/a.md"), config); // "https://example.org/posts/a/"
 * ```
 */
export function routeToPermalink(route: Route, config: Pick<BuildConfig, "baseUrl" | "trailingSlash">): string | null {
    if (route.isParameterized) {
        return null;
    }

    const base = config.baseUrl.replace(/\/+$/, "");
    if (route.path === "/") {
        return `${base}/`;
    }

    const path = route.segments
        .flatMap((segment) => (segment.kind === "literal" ? [encodeURIComponent(segment.value)] : []))
        .join("/");

    return `${base}/${path}${config.trailingSlash ? "/" : ""}`;
}
