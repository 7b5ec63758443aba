/**
 * Route Contract
 *
 * A route is the canonical output path of a document. Directory structure in
 * the content tree mirrors URL structure; bracketed segments are parameter
 * placeholders that a request router binds at serve time.
 */

/**
 * A plain path segment.
 */
export interface LiteralSegment {
    readonly kind: "literal";
    readonly value: string;
}

/**
 * `[name]`: matches exactly one path segment.
 */
export interface SingleParamSegment {
    readonly kind: "param";
    readonly name: string;
}

/**
 * `[...name]`: matches one or more trailing path segments.
 */
export interface CatchAllParamSegment {
    readonly kind: "catchAll";
    readonly name: string;
}

/**
 * Route segment variants.
 */
export type RouteSegment = LiteralSegment | SingleParamSegment | CatchAllParamSegment;

/**
 * Resolved route.
 */
export interface Route {
    /** Route path with a leading slash and no trailing slash, "/" for the root */
    readonly path: string;

    /** Parsed segments, empty for the root */
    readonly segments: readonly RouteSegment[];

    /** Parameter names in segment order */
    readonly parameters: readonly string[];

    /** True when any segment is a placeholder; such a route has no concrete URL */
    readonly isParameterized: boolean;
}

/**
 * Render a single segment back to its path form.
 */
export function formatSegment(segment: RouteSegment): string {
    switch (segment.kind) {
        case "literal":
            return segment.value;
        case "param":
            return `[${segment.name}]`;
        case "catchAll":
            return `[...${segment.name}]`;
    }
}

/**
 * Build a route from its segments.
 */
export function createRoute(segments: readonly RouteSegment[]): Route {
    const parameters = segments.flatMap((segment) => (segment.kind === "literal" ? [] : [segment.name]));

    return {
        path           : `/${segments.map(formatSegment).join("/")}`,
        segments,
        parameters,
        isParameterized: parameters.length > 0,
    };
}
