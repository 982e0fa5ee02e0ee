import { CodePointSet } from "../codepoints.js";
import { lazy } from "../lazy.js";
import { defineCharset, unionCharset } from "./charset.js";
import type { Charset } from "./charset.js";
import { CodePointTable } from "./tables.js";

// Non-kanji rows of JIS X 0208, by category.
const CATEGORIES = [
    "hiragana",
    "katakana",
    "latin",
    "greek",
    "cyrillic",
    "special",
    "boxDrawing",
] as const;

type Category = (typeof CATEGORIES)[number];

const table = lazy(() => CodePointTable.load("jisx0208", CATEGORIES));

function category(name: Category, description: string): Charset {
    return defineCharset(`jisx0208.${name}`, description, () =>
        CodePointSet.fromCodePoints(table().get(name)),
    );
}

/** Row 4: ぁ (U+3041) through ん (U+3093). */
export const hiragana = category("hiragana", "JIS X 0208 hiragana");
/** Row 5: ァ (U+30A1) through ヶ (U+30F6). The prolonged sound mark ー is in `special`. */
export const katakana = category("katakana", "JIS X 0208 katakana");
/** Row 3: fullwidth digits and Latin letters. */
export const latin = category("latin", "JIS X 0208 fullwidth Latin letters and digits");
export const greek = category("greek", "JIS X 0208 Greek letters");
export const cyrillic = category("cyrillic", "JIS X 0208 Cyrillic letters");
/** Rows 1-2: ideographic space, punctuation, brackets and symbols. */
export const special = category("special", "JIS X 0208 special characters");
export const boxDrawing = category("boxDrawing", "JIS X 0208 box drawing characters");

export const all = unionCharset("jisx0208.all", "All JIS X 0208 non-kanji characters", [
    hiragana,
    katakana,
    latin,
    greek,
    cyrillic,
    special,
    boxDrawing,
]);
