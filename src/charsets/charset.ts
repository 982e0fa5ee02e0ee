import { CodePointSet } from "../codepoints.js";
import { lazy } from "../lazy.js";

/** A named, data-backed set with a shared cached instance. */
export interface Charset {
    readonly name: string;
    readonly description: string;
    /** Builds a new set on every call. */
    create(): CodePointSet;
    /** The shared instance; the same reference on every call. */
    cached(): CodePointSet;
}

const registry = new Map<string, Charset>();

/**
 * Register a charset. `cached` defaults to a lazy cell over `build`; pass an
 * existing accessor to share its instance.
 */
export function defineCharset(
    name: string,
    description: string,
    build: () => CodePointSet,
    cached: () => CodePointSet = lazy(build),
): Charset {
    if (registry.has(name)) {
        throw new Error(`Charset "${name}" is already defined`);
    }
    const charset: Charset = { name, description, create: build, cached };
    registry.set(name, charset);
    return charset;
}

/** Charset built as the union of `parts`. */
export function unionCharset(
    name: string,
    description: string,
    parts: readonly Charset[],
): Charset {
    return defineCharset(name, description, () =>
        parts.reduce((acc, part) => acc.union(part.cached()), CodePointSet.empty()),
    );
}

export function lookupCharset(name: string): Charset | undefined {
    return registry.get(name);
}

/** Every registered name, in registration order. */
export function charsetNames(): string[] {
    return [...registry.keys()];
}
