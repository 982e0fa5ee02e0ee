import { CodePointSet } from "./codepoints.js";
import { jisx0201, jisx0208 } from "./charsets/index.js";
import { validateAllInAny } from "./validation.js";
import type { ValidateOptions, ValidationResult } from "./validation.js";

// Shortcuts over the cached charsets.

export function validateHiragana(text: string, options?: ValidateOptions): ValidationResult {
    return jisx0208.hiragana.cached().validate(text, options);
}

export function validateKatakana(text: string, options?: ValidateOptions): ValidationResult {
    return jisx0208.katakana.cached().validate(text, options);
}

/** Each character may be either hiragana or katakana. */
export function validateJapaneseKana(text: string, options?: ValidateOptions): ValidationResult {
    return validateAllInAny(
        text,
        [jisx0208.hiragana.cached(), jisx0208.katakana.cached()],
        options,
    );
}

/** Hiragana, katakana or ASCII printable, mixed freely. */
export function validateJapaneseMixed(text: string, options?: ValidateOptions): ValidationResult {
    return validateAllInAny(
        text,
        [
            jisx0208.hiragana.cached(),
            jisx0208.katakana.cached(),
            CodePointSet.asciiPrintableCached(),
        ],
        options,
    );
}

export function validateJisX0201Katakana(
    text: string,
    options?: ValidateOptions,
): ValidationResult {
    return jisx0201.katakana.cached().validate(text, options);
}

export function validateJisX0201Latin(text: string, options?: ValidateOptions): ValidationResult {
    return jisx0201.latin.cached().validate(text, options);
}
