import { CodePointSet } from "../codepoints.js";
import { lazy } from "../lazy.js";
import { defineCharset, unionCharset } from "./charset.js";
import { CodePointTable } from "./tables.js";

const table = lazy(() => CodePointTable.load("jisx0208kanji", ["level1", "level2"] as const));

/** 2965 kanji, rows 16-47. */
export const level1 = defineCharset("jisx0208kanji.level1", "JIS X 0208 level 1 kanji", () =>
    CodePointSet.fromCodePoints(table().get("level1")),
);

/** 3390 kanji, rows 48-84. */
export const level2 = defineCharset("jisx0208kanji.level2", "JIS X 0208 level 2 kanji", () =>
    CodePointSet.fromCodePoints(table().get("level2")),
);

export const all = unionCharset("jisx0208kanji.all", "JIS X 0208 kanji (levels 1 and 2)", [
    level1,
    level2,
]);
