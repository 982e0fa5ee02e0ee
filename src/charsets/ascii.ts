import { CodePointSet } from "../codepoints.js";
import { defineCharset } from "./charset.js";

export const control = defineCharset(
    "ascii.control",
    "ASCII control characters (U+0000-U+001F, U+007F)",
    () => CodePointSet.asciiControl(),
    CodePointSet.asciiControlCached,
);

export const printable = defineCharset(
    "ascii.printable",
    "ASCII printable characters (U+0020-U+007E)",
    () => CodePointSet.asciiPrintable(),
    CodePointSet.asciiPrintableCached,
);

export const crlf = defineCharset(
    "ascii.crlf",
    "Carriage return and line feed",
    () => CodePointSet.crlf(),
    CodePointSet.crlfCached,
);

export const all = defineCharset(
    "ascii.all",
    "All 128 ASCII characters",
    () => CodePointSet.asciiAll(),
    CodePointSet.asciiAllCached,
);
