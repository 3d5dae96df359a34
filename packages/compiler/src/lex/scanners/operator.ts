import { type Token, TokenKind } from '../../core/tokens.ts'
import type { ScanContext } from '../scan-context.ts'

const THREE_CHAR: ReadonlyMap<string, TokenKind> = new Map<string, TokenKind>([
	['..=', TokenKind.OpDotDotEq],
	['<<=', TokenKind.OpShlAssign],
	['>>=', TokenKind.OpShrAssign],
])

const TWO_CHAR: ReadonlyMap<string, TokenKind> = new Map<string, TokenKind>([
	['!=', TokenKind.OpNe],
	['%=', TokenKind.OpPercentAssign],
	['&&', TokenKind.OpLogicalAnd],
	['&=', TokenKind.OpAndAssign],
	['*=', TokenKind.OpStarAssign],
	['+=', TokenKind.OpPlusAssign],
	['-=', TokenKind.OpMinusAssign],
	['->', TokenKind.OpArrow],
	['..', TokenKind.OpDotDot],
	['/=', TokenKind.OpSlashAssign],
	['::', TokenKind.OpColonColon],
	['<<', TokenKind.OpBitShl],
	['<=', TokenKind.OpLe],
	['==', TokenKind.OpEq],
	['=>', TokenKind.OpFatArrow],
	['>=', TokenKind.OpGe],
	['>>', TokenKind.OpBitShr],
	['^=', TokenKind.OpXorAssign],
	['|=', TokenKind.OpOrAssign],
	['||', TokenKind.OpLogicalOr],
])

const ONE_CHAR: ReadonlyMap<string, TokenKind> = new Map<string, TokenKind>([
	['!', TokenKind.OpLogicalNot],
	['#', TokenKind.OpHash],
	['$', TokenKind.OpDollar],
	['%', TokenKind.OpPercent],
	['&', TokenKind.OpBitAnd],
	['(', TokenKind.DelimLParen],
	[')', TokenKind.DelimRParen],
	['*', TokenKind.OpStar],
	['+', TokenKind.OpPlus],
	[',', TokenKind.DelimComma],
	['-', TokenKind.OpMinus],
	['.', TokenKind.OpDot],
	['/', TokenKind.OpSlash],
	[':', TokenKind.DelimColon],
	[';', TokenKind.DelimSemicolon],
	['<', TokenKind.OpLt],
	['=', TokenKind.OpAssign],
	['>', TokenKind.OpGt],
	['@', TokenKind.OpAt],
	['[', TokenKind.DelimLBracket],
	['\\', TokenKind.OpBackslash],
	[']', TokenKind.DelimRBracket],
	['^', TokenKind.OpBitXor],
	['{', TokenKind.DelimLBrace],
	['|', TokenKind.OpBitOr],
	['}', TokenKind.DelimRBrace],
	['~', TokenKind.OpBitNot],
])

const TABLES: readonly (readonly [number, ReadonlyMap<string, TokenKind>])[] = [
	[3, THREE_CHAR],
	[2, TWO_CHAR],
	[1, ONE_CHAR],
]

export function canScanOperator(ctx: ScanContext): boolean {
	return ONE_CHAR.has(ctx.peekText(1))
}

/** Longest operator or delimiter at the cursor. */
export function scanOperator(ctx: ScanContext): Token {
	const start = ctx.location()
	for (const [length, table] of TABLES) {
		const kind = table.get(ctx.peekText(length))
		if (kind !== undefined) {
			ctx.advance(length)
			return ctx.makeToken(kind, start)
		}
	}
	ctx.advance()
	return ctx.makeUnknown(start)
}
