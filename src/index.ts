export { CodePointSet } from "./codepoints.js";
export type { ExcludedCodePoint } from "./codepoints.js";
export {
    ValidationError,
    containsAllInAny,
    validateAllInAny,
    formatCodePoint,
} from "./validation.js";
export type { ValidationResult, ValidateOptions } from "./validation.js";
export { lazy } from "./lazy.js";
export * from "./charsets/index.js";
export * from "./validators.js";
