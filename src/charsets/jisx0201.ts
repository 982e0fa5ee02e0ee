import { CodePointSet } from "../codepoints.js";
import { lazy } from "../lazy.js";
import { defineCharset, unionCharset } from "./charset.js";
import { CodePointTable } from "./tables.js";

const table = lazy(() => CodePointTable.load("jisx0201", ["latin", "katakana"] as const));

/**
 * The JIS-Roman half of JIS X 0201: ASCII printable up to `}` with YEN SIGN
 * in place of the backslash and OVERLINE in place of the tilde.
 */
export const latin = defineCharset("jisx0201.latin", "JIS X 0201 Latin letters", () =>
    CodePointSet.fromCodePoints(table().get("latin")),
);

/** Halfwidth katakana and punctuation, U+FF61-U+FF9F. */
export const katakana = defineCharset("jisx0201.katakana", "JIS X 0201 halfwidth katakana", () =>
    CodePointSet.fromCodePoints(table().get("katakana")),
);

export const all = unionCharset("jisx0201.all", "All JIS X 0201 characters", [latin, katakana]);
