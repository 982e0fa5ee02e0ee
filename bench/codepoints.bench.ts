/**
 * CodePointSet benchmarks.
 *
 * Membership scans should stay linear in text length; set algebra over the
 * kanji tables should stay linear in set size.
 */

import { bench, describe } from "vitest";

import { CodePointSet } from "../src/codepoints.js";
import { jisx0208, jisx0208kanji, jisx0213kanji } from "../src/charsets/index.js";
import { validateAllInAny } from "../src/validation.js";

const kanji = jisx0208kanji.all.cached();
const kanji0213 = jisx0213kanji.all.cached();
const japanese = [jisx0208.hiragana.cached(), jisx0208.katakana.cached(), kanji];

const kanjiText = kanji.toArray().slice(0, 1000).map((cp) => String.fromCodePoint(cp)).join("");
const mixedText = "日本語のテキストとカタカナ、ひらがな。".repeat(200);
const longAscii = "The quick brown fox jumps over the lazy dog. ".repeat(1000);

describe("membership", () => {
    bench("contains: 1K kanji", () => {
        kanji.contains(kanjiText);
    });

    bench("contains: 45K ASCII printable", () => {
        CodePointSet.asciiPrintableCached().contains(longAscii);
    });

    bench("allExcluded: mixed text against kanji", () => {
        kanji.allExcluded(mixedText);
    });

    bench("validateAllInAny: mixed text against kana and kanji", () => {
        validateAllInAny(mixedText, japanese);
    });
});

describe("set algebra", () => {
    bench("union: JIS X 0208 kanji with JIS X 0213 kanji", () => {
        kanji.union(kanji0213);
    });

    bench("difference: JIS X 0213 kanji minus JIS X 0208 kanji", () => {
        kanji0213.difference(kanji);
    });

    bench("isSubsetOf: JIS X 0208 kanji in JIS X 0213 kanji", () => {
        kanji.isSubsetOf(kanji0213);
    });

    bench("hashCode: fresh JIS X 0213 kanji set", () => {
        jisx0213kanji.all.create().hashCode();
    });
});

describe("construction", () => {
    bench("fromString: 45K ASCII", () => {
        CodePointSet.fromString(longAscii);
    });

    bench("create: JIS X 0208 kanji", () => {
        jisx0208kanji.all.create();
    });
});
