/**
 * Token and trivia model.
 * Tokens never own text: they hold a buffer handle plus byte ranges, and text
 * is resolved through the SourceManager.
 */

/** Handle into the SourceManager; buffer index plus one. */
export type BufferId = number & { readonly __brand: 'BufferId' }

export function bufferId(n: number): BufferId {
	return n as BufferId
}

export const INVALID_BUFFER: BufferId = bufferId(0)

/** Handle to recorded macro-expansion info; 0 is invalid. */
export type ExpansionId = number & { readonly __brand: 'ExpansionId' }

export function expansionId(n: number): ExpansionId {
	return n as ExpansionId
}

/**
 * Position of a byte in a buffer.
 * Line and column are 1-based; column counts UTF-8 characters.
 */
export interface SourceLocation {
	readonly buffer: BufferId
	readonly line: number
	readonly column: number
	/** 0-based byte offset */
	readonly offset: number
}

/** Token kinds. Each value is the kind's display name. */
export const TokenKind = {
	Identifier: 'IDENTIFIER',

	// Keywords
	KwAs: 'KW_AS',
	KwBreak: 'KW_BREAK',
	KwContinue: 'KW_CONTINUE',
	KwElse: 'KW_ELSE',
	KwEnum: 'KW_ENUM',
	KwFn: 'KW_FN',
	KwFor: 'KW_FOR',
	KwIf: 'KW_IF',
	KwImpl: 'KW_IMPL',
	KwImport: 'KW_IMPORT',
	KwIn: 'KW_IN',
	KwLet: 'KW_LET',
	KwMatch: 'KW_MATCH',
	KwReturn: 'KW_RETURN',
	KwStruct: 'KW_STRUCT',
	KwTrait: 'KW_TRAIT',
	KwType: 'KW_TYPE',
	KwVar: 'KW_VAR',
	KwWhile: 'KW_WHILE',

	// Comments
	CommentBlock: 'COMMENT_BLOCK',
	CommentDoc: 'COMMENT_DOC',
	CommentLine: 'COMMENT_LINE',

	// Literals
	LitDecimal: 'LIT_DECIMAL',
	LitFalse: 'LIT_FALSE',
	LitFloat: 'LIT_FLOAT',
	LitInt: 'LIT_INT',
	LitNull: 'LIT_NULL',
	LitRawString: 'LIT_RAW_STRING',
	LitString: 'LIT_STRING',
	LitTexString: 'LIT_TEX_STRING',
	LitTrue: 'LIT_TRUE',

	// Arithmetic, comparison, logical
	OpEq: 'OP_EQ',
	OpGe: 'OP_GE',
	OpGt: 'OP_GT',
	OpLe: 'OP_LE',
	OpLogicalAnd: 'OP_LOGICAL_AND',
	OpLogicalNot: 'OP_LOGICAL_NOT',
	OpLogicalOr: 'OP_LOGICAL_OR',
	OpLt: 'OP_LT',
	OpMinus: 'OP_MINUS',
	OpNe: 'OP_NE',
	OpPercent: 'OP_PERCENT',
	OpPlus: 'OP_PLUS',
	OpSlash: 'OP_SLASH',
	OpStar: 'OP_STAR',

	// Bitwise
	OpBitAnd: 'OP_BIT_AND',
	OpBitNot: 'OP_BIT_NOT',
	OpBitOr: 'OP_BIT_OR',
	OpBitShl: 'OP_BIT_SHL',
	OpBitShr: 'OP_BIT_SHR',
	OpBitXor: 'OP_BIT_XOR',

	// Assignment
	OpAndAssign: 'OP_AND_ASSIGN',
	OpAssign: 'OP_ASSIGN',
	OpMinusAssign: 'OP_MINUS_ASSIGN',
	OpOrAssign: 'OP_OR_ASSIGN',
	OpPercentAssign: 'OP_PERCENT_ASSIGN',
	OpPlusAssign: 'OP_PLUS_ASSIGN',
	OpShlAssign: 'OP_SHL_ASSIGN',
	OpShrAssign: 'OP_SHR_ASSIGN',
	OpSlashAssign: 'OP_SLASH_ASSIGN',
	OpStarAssign: 'OP_STAR_ASSIGN',
	OpXorAssign: 'OP_XOR_ASSIGN',

	// Range and other operators
	OpArrow: 'OP_ARROW',
	OpAt: 'OP_AT',
	OpColonColon: 'OP_COLON_COLON',
	OpDot: 'OP_DOT',
	OpDotDot: 'OP_DOT_DOT',
	OpDotDotEq: 'OP_DOT_DOT_EQ',
	OpFatArrow: 'OP_FAT_ARROW',

	// Delimiters
	DelimColon: 'DELIM_COLON',
	DelimComma: 'DELIM_COMMA',
	DelimLBrace: 'DELIM_LBRACE',
	DelimLBracket: 'DELIM_LBRACKET',
	DelimLParen: 'DELIM_LPAREN',
	DelimRBrace: 'DELIM_RBRACE',
	DelimRBracket: 'DELIM_RBRACKET',
	DelimRParen: 'DELIM_RPAREN',
	DelimSemicolon: 'DELIM_SEMICOLON',
	DelimUnderscore: 'DELIM_UNDERSCORE',

	// Reserved
	OpBackslash: 'OP_BACKSLASH',
	OpDollar: 'OP_DOLLAR',
	OpHash: 'OP_HASH',

	// Special
	Eof: 'TOKEN_EOF',
	Newline: 'TOKEN_NEWLINE',
	Unknown: 'TOKEN_UNKNOWN',
	Whitespace: 'TOKEN_WHITESPACE',
} as const

export type TokenKind = (typeof TokenKind)[keyof typeof TokenKind]

const KEYWORDS: ReadonlyMap<string, TokenKind> = new Map<string, TokenKind>([
	['let', TokenKind.KwLet],
	['var', TokenKind.KwVar],
	['fn', TokenKind.KwFn],
	['struct', TokenKind.KwStruct],
	['enum', TokenKind.KwEnum],
	['type', TokenKind.KwType],
	['impl', TokenKind.KwImpl],
	['trait', TokenKind.KwTrait],
	['return', TokenKind.KwReturn],
	['if', TokenKind.KwIf],
	['else', TokenKind.KwElse],
	['while', TokenKind.KwWhile],
	['for', TokenKind.KwFor],
	['in', TokenKind.KwIn],
	['break', TokenKind.KwBreak],
	['continue', TokenKind.KwContinue],
	['match', TokenKind.KwMatch],
	['import', TokenKind.KwImport],
	['as', TokenKind.KwAs],
	['true', TokenKind.LitTrue],
	['false', TokenKind.LitFalse],
	['null', TokenKind.LitNull],
	['_', TokenKind.DelimUnderscore],
])

/** Exact, case-sensitive keyword lookup. */
export function lookupKeyword(word: string): TokenKind | undefined {
	return KEYWORDS.get(word)
}

export function isKeyword(kind: TokenKind): boolean {
	return kind.startsWith('KW_')
}

export function isLiteral(kind: TokenKind): boolean {
	return kind.startsWith('LIT_')
}

export function isStringLiteral(kind: TokenKind): boolean {
	return kind === TokenKind.LitString || kind === TokenKind.LitRawString || kind === TokenKind.LitTexString
}

export function isOperator(kind: TokenKind): boolean {
	return kind.startsWith('OP_')
}

export function isDelimiter(kind: TokenKind): boolean {
	return kind.startsWith('DELIM_')
}

/** Escape categories seen in a string literal, as bit flags. */
export const EscapeFlags = {
	Hex: 2,
	LiteralControl: 8,
	Named: 1,
	None: 0,
	Unicode: 4,
} as const

export type EscapeFlag = (typeof EscapeFlags)[keyof typeof EscapeFlags]

export function hasEscape(flags: number, flag: EscapeFlag): boolean {
	return (flags & flag) !== 0
}

export type TriviaKind = 'whitespace' | 'newline' | 'comment'

export interface Trivia {
	readonly kind: TriviaKind
	readonly buffer: BufferId
	readonly offset: number
	readonly length: number
}

/**
 * One lexical token.
 *
 * `offset`/`length` cover the raw literal. `valueOffset`/`valueLength` cover
 * the semantic value: string kinds exclude prefix, hashes and quotes; every
 * other kind has both ranges equal.
 */
export interface Token {
	readonly kind: TokenKind
	readonly buffer: BufferId
	readonly offset: number
	readonly length: number
	readonly valueOffset: number
	readonly valueLength: number
	readonly location: SourceLocation
	/** EscapeFlags bit set */
	readonly escapes: number
	readonly leadingTrivia: readonly Trivia[]
	readonly trailingTrivia: readonly Trivia[]
	readonly expansion: ExpansionId | null
}

export interface TokenInit {
	readonly kind: TokenKind
	readonly location: SourceLocation
	readonly length: number
	readonly valueOffset?: number
	readonly valueLength?: number
	readonly escapes?: number
}

export function createToken(init: TokenInit): Token {
	const { kind, location, length } = init
	return {
		buffer: location.buffer,
		escapes: init.escapes ?? EscapeFlags.None,
		expansion: null,
		kind,
		leadingTrivia: [],
		length,
		location,
		offset: location.offset,
		trailingTrivia: [],
		valueLength: init.valueLength ?? length,
		valueOffset: init.valueOffset ?? location.offset,
	}
}

export function createEofToken(location: SourceLocation): Token {
	return createToken({ kind: TokenKind.Eof, length: 0, location })
}

export function withTrivia(token: Token, leadingTrivia: readonly Trivia[], trailingTrivia: readonly Trivia[]): Token {
	return { ...token, leadingTrivia, trailingTrivia }
}

export function hasTrivia(token: Token): boolean {
	return token.leadingTrivia.length > 0 || token.trailingTrivia.length > 0
}

/** Anything that can resolve a byte range of a buffer to text. */
export interface TextSource {
	slice(buffer: BufferId, offset: number, length: number): string
}

/** Semantic text of the token, e.g. a string's content without quotes. */
export function tokenValue(token: Token, source: TextSource): string {
	return source.slice(token.buffer, token.valueOffset, token.valueLength)
}

/** The token's source text exactly as written. */
export function tokenRawLiteral(token: Token, source: TextSource): string {
	return source.slice(token.buffer, token.offset, token.length)
}

export function triviaText(trivia: Trivia, source: TextSource): string {
	return source.slice(trivia.buffer, trivia.offset, trivia.length)
}
