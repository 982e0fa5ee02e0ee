import { CodePointSet } from "../codepoints.js";
import { lazy } from "../lazy.js";
import { defineCharset } from "./charset.js";
import { all as jisx0208Kanji } from "./jisx0208kanji.js";
import { CodePointTable } from "./tables.js";

// Levels 1 and 2 are shared with JIS X 0208; the table holds only what 0213 adds.
const table = lazy(() => CodePointTable.load("jisx0213kanji", ["level3", "level4"] as const));

export const all = defineCharset(
    "jisx0213kanji.all",
    "JIS X 0213:2004 kanji (levels 1 to 4)",
    () =>
        jisx0208Kanji
            .cached()
            .union(CodePointSet.fromCodePoints(table().get("level3")))
            .union(CodePointSet.fromCodePoints(table().get("level4"))),
);
