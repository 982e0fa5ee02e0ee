import type { CodePointSet } from "./codepoints.js";

/**
 * Describes a character outside the allowed set, as carried by a failed
 * `ValidationResult`. `position` counts characters, not UTF-16 code units.
 */
export class ValidationError extends Error {
    readonly codePoint: number;
    readonly position: number;

    constructor(codePoint: number, position: number, message?: string) {
        super(message ?? describeInvalidCharacter(codePoint, position));
        this.name = "ValidationError";
        this.codePoint = codePoint;
        this.position = position;
    }

    /** Same error location, caller-supplied message. */
    static withMessage(codePoint: number, position: number, message: string): ValidationError {
        return new ValidationError(codePoint, position, message);
    }
}

export type ValidationResult =
    | { readonly ok: true }
    | { readonly ok: false; readonly error: ValidationError };

export interface ValidateOptions {
    /** Replaces the default "invalid character ..." message. */
    message?: string;
}

export const VALID: ValidationResult = { ok: true };

export function invalid(
    codePoint: number,
    position: number,
    options: ValidateOptions = {},
): ValidationResult {
    return { ok: false, error: new ValidationError(codePoint, position, options.message) };
}

/** `U+XXXX`, at least four upper-case hex digits. */
export function formatCodePoint(codePoint: number): string {
    return `U+${codePoint.toString(16).toUpperCase().padStart(4, "0")}`;
}

function isScalarValue(codePoint: number): boolean {
    return codePoint <= 0x10ffff && (codePoint < 0xd800 || codePoint > 0xdfff);
}

export function describeInvalidCharacter(codePoint: number, position: number): string {
    const glyph = isScalarValue(codePoint) ? String.fromCodePoint(codePoint) : "\uFFFD";
    return `invalid character '${glyph}' (${formatCodePoint(codePoint)}) at position ${position}`;
}

// --- Multi-set membership ---

/**
 * True when every character of `text` belongs to at least one of `sets`.
 * An empty list of sets accepts nothing, not even the empty string.
 */
export function containsAllInAny(text: string, sets: readonly CodePointSet[]): boolean {
    if (sets.length === 0) return false;

    for (const ch of text) {
        const codePoint = ch.codePointAt(0) ?? 0;
        if (!sets.some((set) => set.has(codePoint))) return false;
    }
    return true;
}

/**
 * Reports the first character of `text` that none of `sets` contains.
 *
 * The empty string is valid against any list, including an empty one; any
 * other text fails on its first character when `sets` is empty.
 */
export function validateAllInAny(
    text: string,
    sets: readonly CodePointSet[],
    options: ValidateOptions = {},
): ValidationResult {
    let position = 0;
    for (const ch of text) {
        const codePoint = ch.codePointAt(0) ?? 0;
        if (!sets.some((set) => set.has(codePoint))) {
            return invalid(codePoint, position, options);
        }
        position++;
    }
    return VALID;
}
