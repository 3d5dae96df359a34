/**
 * Re-export the lexer error catalog from the shared package.
 */

export {
	type DiagnosticArgs,
	type ErrorDef,
	getLexerError,
	interpolateMessage,
	LEXER_ERRORS,
	LexerErrorCode,
} from '@corvid/diagnostics'
