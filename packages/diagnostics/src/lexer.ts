/**
 * Lexer error catalog.
 *
 * Code layout (category L):
 * - 1001-1006: numeric literals
 * - 1011-1015: string literals
 * - 1021-1022: characters and encoding
 * - 1031: comments
 * - 1041: limits
 */

import type { ErrorDef } from './types.ts'

export const LexerErrorCode = {
	InvalidCharacter: 1021,
	InvalidEscapeSequence: 1011,
	InvalidHexEscape: 1013,
	InvalidNumberSuffix: 1006,
	InvalidTrailingChar: 1005,
	InvalidUnicodeEscape: 1014,
	InvalidUtf8Sequence: 1022,
	MissingBinaryDigits: 1002,
	MissingExponentDigits: 1004,
	MissingHexDigits: 1001,
	MissingOctalDigits: 1003,
	TokenTooLong: 1041,
	UnterminatedBlockComment: 1031,
	UnterminatedRawString: 1015,
	UnterminatedString: 1012,
} as const

export type LexerErrorCode = (typeof LexerErrorCode)[keyof typeof LexerErrorCode]

// =============================================================================
// NUMERIC LITERALS (1001-1006)
// =============================================================================

const NUMBER_ERRORS: readonly ErrorDef[] = [
	{
		brief: 'missing hexadecimal digits after `0x`',
		code: LexerErrorCode.MissingHexDigits,
		key: 'lexer.missing_hex_digits',
		message: "missing hexadecimal digits after '{prefix}'",
	},
	{
		brief: 'missing binary digits after `0b`',
		code: LexerErrorCode.MissingBinaryDigits,
		key: 'lexer.missing_binary_digits',
		message: "missing binary digits after '{prefix}'",
	},
	{
		brief: 'missing octal digits after `0o`',
		code: LexerErrorCode.MissingOctalDigits,
		key: 'lexer.missing_octal_digits',
		message: "missing octal digits after '{prefix}'",
	},
	{
		brief: 'missing digits in exponent',
		code: LexerErrorCode.MissingExponentDigits,
		key: 'lexer.missing_exponent_digits',
		message: 'missing digits in exponent',
	},
	{
		brief: 'invalid trailing character in number literal',
		code: LexerErrorCode.InvalidTrailingChar,
		key: 'lexer.invalid_trailing_char',
		message: "invalid trailing character '{char}' in number literal",
	},
	{
		brief: 'invalid number suffix',
		code: LexerErrorCode.InvalidNumberSuffix,
		key: 'lexer.invalid_number_suffix',
		message: "invalid number suffix '{suffix}'",
	},
]

// =============================================================================
// STRING LITERALS (1011-1015)
// =============================================================================

const STRING_ERRORS: readonly ErrorDef[] = [
	{
		brief: 'invalid escape sequence',
		code: LexerErrorCode.InvalidEscapeSequence,
		key: 'lexer.invalid_escape_sequence',
		message: "invalid escape sequence '\\{char}'",
	},
	{
		brief: 'unterminated string literal',
		code: LexerErrorCode.UnterminatedString,
		key: 'lexer.unterminated_string',
		message: 'unterminated string literal',
	},
	{
		brief: 'invalid hexadecimal escape sequence',
		code: LexerErrorCode.InvalidHexEscape,
		key: 'lexer.invalid_hex_escape',
		message: "invalid hexadecimal escape sequence: expected 2 hex digits after '\\x'",
	},
	{
		brief: 'invalid Unicode escape sequence',
		code: LexerErrorCode.InvalidUnicodeEscape,
		key: 'lexer.invalid_unicode_escape',
		message: "invalid Unicode escape sequence '{text}'",
	},
	{
		brief: 'unterminated raw string literal',
		code: LexerErrorCode.UnterminatedRawString,
		key: 'lexer.unterminated_raw_string',
		message: 'unterminated raw string literal',
	},
]

// =============================================================================
// CHARACTERS, COMMENTS, LIMITS (1021-1041)
// =============================================================================

const OTHER_ERRORS: readonly ErrorDef[] = [
	{
		brief: 'invalid character',
		code: LexerErrorCode.InvalidCharacter,
		key: 'lexer.invalid_character',
		message: "invalid character '{char}'",
	},
	{
		brief: 'invalid UTF-8 sequence',
		code: LexerErrorCode.InvalidUtf8Sequence,
		key: 'lexer.invalid_utf8_sequence',
		message: 'invalid UTF-8 sequence (byte 0x{byte})',
	},
	{
		brief: 'unterminated block comment',
		code: LexerErrorCode.UnterminatedBlockComment,
		key: 'lexer.unterminated_block_comment',
		message: 'unterminated block comment',
	},
	{
		brief: 'token length exceeds limit',
		code: LexerErrorCode.TokenTooLong,
		key: 'lexer.token_too_long',
		message: 'token length {length} exceeds maximum allowed length {max}',
	},
]

export const LEXER_ERRORS: readonly ErrorDef[] = [...NUMBER_ERRORS, ...STRING_ERRORS, ...OTHER_ERRORS]

const byCode = new Map(LEXER_ERRORS.map((def) => [def.code, def]))

/**
 * Get a lexer error definition by code.
 */
export function getLexerError(code: LexerErrorCode): ErrorDef {
	const def = byCode.get(code)
	if (def === undefined) throw new Error(`Unknown lexer error code: ${code}`)
	return def
}
