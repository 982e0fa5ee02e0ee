import * as ascii from "./ascii.js";
import * as jisx0201 from "./jisx0201.js";
import * as jisx0208 from "./jisx0208.js";
import * as jisx0208kanji from "./jisx0208kanji.js";
import * as jisx0213kanji from "./jisx0213kanji.js";

export { ascii, jisx0201, jisx0208, jisx0208kanji, jisx0213kanji };
export * from "./charset.js";
export * from "./tables.js";
