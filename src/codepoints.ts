import { lazy } from "./lazy.js";
import { VALID, invalid } from "./validation.js";
import type { ValidateOptions, ValidationResult } from "./validation.js";

/** A character outside a set, with its character index in the scanned text. */
export interface ExcludedCodePoint {
    codePoint: number;
    position: number;
}

const MAX_CODE_POINT_VALUE = 0xffffffff;

function checkCodePoint(value: number): number {
    if (!Number.isInteger(value) || value < 0 || value > MAX_CODE_POINT_VALUE) {
        throw new RangeError(`Not a code point: ${value}`);
    }
    return value;
}

function range(from: number, to: number): number[] {
    const out: number[] = [];
    for (let code = from; code <= to; code++) out.push(code);
    return out;
}

/**
 * Immutable set of Unicode code points.
 *
 * Strings are scanned by code point, so a character outside the BMP is one
 * member and one position, never a surrogate pair.
 */
export class CodePointSet implements Iterable<number> {
    private readonly codePoints: ReadonlySet<number>;
    private hash: number | undefined;

    private constructor(codePoints: Set<number>) {
        this.codePoints = codePoints;
    }

    static fromCodePoints(values: Iterable<number>): CodePointSet {
        const codePoints = new Set<number>();
        for (const value of values) codePoints.add(checkCodePoint(value));
        return new CodePointSet(codePoints);
    }

    /** Every distinct character of `text`. */
    static fromString(text: string): CodePointSet {
        const codePoints = new Set<number>();
        for (const ch of text) codePoints.add(ch.codePointAt(0) ?? 0);
        return new CodePointSet(codePoints);
    }

    static from(source: string | Iterable<number>): CodePointSet {
        return typeof source === "string"
            ? CodePointSet.fromString(source)
            : CodePointSet.fromCodePoints(source);
    }

    static empty(): CodePointSet {
        return new CodePointSet(new Set());
    }

    // --- ASCII ---

    /** C0 controls U+0000..U+001F and DEL. */
    static asciiControl(): CodePointSet {
        return new CodePointSet(new Set([...range(0x00, 0x1f), 0x7f]));
    }

    /** U+0020..U+007E. */
    static asciiPrintable(): CodePointSet {
        return new CodePointSet(new Set(range(0x20, 0x7e)));
    }

    static crlf(): CodePointSet {
        return new CodePointSet(new Set([0x0a, 0x0d]));
    }

    static asciiAll(): CodePointSet {
        return CodePointSet.asciiControl()
            .union(CodePointSet.asciiPrintable())
            .union(CodePointSet.crlf());
    }

    static readonly asciiControlCached = lazy(() => CodePointSet.asciiControl());
    static readonly asciiPrintableCached = lazy(() => CodePointSet.asciiPrintable());
    static readonly crlfCached = lazy(() => CodePointSet.crlf());
    static readonly asciiAllCached = lazy(() => CodePointSet.asciiAll());

    // --- Membership ---

    /** Membership of a numeric code point; throws RangeError for a value that is not one. */
    has(codePoint: number): boolean {
        if (this.codePoints.has(codePoint)) return true;
        checkCodePoint(codePoint);
        return false;
    }

    /** Membership of a single character; `char` must hold exactly one code point. */
    containsChar(char: string): boolean {
        const codePoint = char.codePointAt(0);
        if (codePoint === undefined || String.fromCodePoint(codePoint).length !== char.length) {
            throw new RangeError(`Expected a single character, got ${JSON.stringify(char)}`);
        }
        return this.codePoints.has(codePoint);
    }

    /** True when every character of `text` is a member; vacuously true for "". */
    contains(text: string): boolean {
        for (const ch of text) {
            if (!this.codePoints.has(ch.codePointAt(0) ?? 0)) return false;
        }
        return true;
    }

    firstExcludedWithPosition(text: string): ExcludedCodePoint | undefined {
        let position = 0;
        for (const ch of text) {
            const codePoint = ch.codePointAt(0) ?? 0;
            if (!this.codePoints.has(codePoint)) return { codePoint, position };
            position++;
        }
        return undefined;
    }

    firstExcluded(text: string): number | undefined {
        return this.firstExcludedWithPosition(text)?.codePoint;
    }

    /** Distinct non-members of `text`, in the order they first appear. */
    allExcluded(text: string): number[] {
        const seen = new Set<number>();
        for (const ch of text) {
            const codePoint = ch.codePointAt(0) ?? 0;
            if (!this.codePoints.has(codePoint)) seen.add(codePoint);
        }
        return [...seen];
    }

    validate(text: string, options: ValidateOptions = {}): ValidationResult {
        const excluded = this.firstExcludedWithPosition(text);
        if (!excluded) return VALID;
        return invalid(excluded.codePoint, excluded.position, options);
    }

    // --- Set algebra ---

    union(other: CodePointSet): CodePointSet {
        const result = new Set(this.codePoints);
        for (const code of other.codePoints) result.add(code);
        return new CodePointSet(result);
    }

    intersection(other: CodePointSet): CodePointSet {
        const [small, large] =
            this.len() <= other.len() ? [this, other] : [other, this];
        const result = new Set<number>();
        for (const code of small.codePoints) {
            if (large.codePoints.has(code)) result.add(code);
        }
        return new CodePointSet(result);
    }

    difference(other: CodePointSet): CodePointSet {
        const result = new Set<number>();
        for (const code of this.codePoints) {
            if (!other.codePoints.has(code)) result.add(code);
        }
        return new CodePointSet(result);
    }

    symmetricDifference(other: CodePointSet): CodePointSet {
        const result = new Set<number>();
        for (const code of this.codePoints) {
            if (!other.codePoints.has(code)) result.add(code);
        }
        for (const code of other.codePoints) {
            if (!this.codePoints.has(code)) result.add(code);
        }
        return new CodePointSet(result);
    }

    isSubsetOf(other: CodePointSet): boolean {
        if (this.len() > other.len()) return false;
        for (const code of this.codePoints) {
            if (!other.codePoints.has(code)) return false;
        }
        return true;
    }

    isSupersetOf(other: CodePointSet): boolean {
        return other.isSubsetOf(this);
    }

    // --- Introspection ---

    len(): number {
        return this.codePoints.size;
    }

    get size(): number {
        return this.codePoints.size;
    }

    isEmpty(): boolean {
        return this.codePoints.size === 0;
    }

    [Symbol.iterator](): Iterator<number> {
        return this.codePoints.values();
    }

    /** Members in ascending order. */
    toArray(): number[] {
        return [...this.codePoints].sort((a, b) => a - b);
    }

    equals(other: CodePointSet): boolean {
        return this === other || (this.len() === other.len() && this.isSubsetOf(other));
    }

    /**
     * FNV-1a over the sorted members, so equal sets hash equally whatever
     * order they were built in.
     */
    hashCode(): number {
        if (this.hash !== undefined) return this.hash;

        let h = 0x811c9dc5;
        for (const code of this.toArray()) {
            for (let shift = 0; shift < 32; shift += 8) {
                h ^= (code >>> shift) & 0xff;
                h = Math.imul(h, 0x01000193);
            }
        }
        this.hash = h >>> 0;
        return this.hash;
    }

    toString(): string {
        return `CodePointSet(${this.len()} items)`;
    }
}
