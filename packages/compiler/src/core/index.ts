/**
 * Core data structures for the Corvid front end.
 */

export {
	type DiagnosticArgs,
	type ErrorDef,
	getLexerError,
	interpolateMessage,
	LEXER_ERRORS,
	LexerErrorCode,
} from './diagnostics.ts'
export { LIMITS } from './limits.ts'
export {
	type BufferId,
	bufferId,
	createEofToken,
	createToken,
	type EscapeFlag,
	EscapeFlags,
	type ExpansionId,
	expansionId,
	hasEscape,
	hasTrivia,
	INVALID_BUFFER,
	isDelimiter,
	isKeyword,
	isLiteral,
	isOperator,
	isStringLiteral,
	lookupKeyword,
	type SourceLocation,
	type TextSource,
	type Token,
	type TokenInit,
	TokenKind,
	tokenRawLiteral,
	tokenValue,
	type Trivia,
	type TriviaKind,
	triviaText,
	withTrivia,
} from './tokens.ts'
