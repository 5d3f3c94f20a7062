/**
 * Text normalization constants
 *
 * These parameters control the deterministic tokenization used by the
 * in-process capabilities (hashing embedder, lexical relevance scorer).
 */

/**
 * Regular expression pattern for splitting text into tokens.
 *
 * Splits on:
 * - Whitespace (spaces, tabs, newlines)
 * - Common separators: / \ | ( ) [ ] { } , ; : ! ? " '
 * - Unicode punctuation: curly quotes “”, apostrophes ‘’
 *
 * Periods and hyphens are not separators so "node.js" and "full-stack"
 * stay single tokens; edge periods are stripped after splitting.
 */
export const TOKEN_SEPARATOR_PATTERN = /[\s\/\\|()[\]{},;:!?"'“”‘’]+/;

/**
 * Periods left at either end of a token after splitting ("done." → "done").
 */
export const EDGE_PERIOD_PATTERN = /^\.+|\.+$/g;

/**
 * Word characters for whole-word matching (letters, digits, underscore).
 */
export const WORD_CHAR_PATTERN = /[\p{L}\p{N}_]/u;
