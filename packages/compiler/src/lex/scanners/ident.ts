import { LexerErrorCode } from '../../core/diagnostics.ts'
import { lookupKeyword, type Token, TokenKind } from '../../core/tokens.ts'
import { hexByte, type ScanContext } from '../scan-context.ts'
import { isAsciiIdentContinue, isAsciiIdentStart, isMultiByteLead } from '../utf8.ts'

export function canScanIdent(ctx: ScanContext): boolean {
	const byte = ctx.current()
	return isAsciiIdentStart(byte) || (byte !== undefined && isMultiByteLead(byte))
}

/**
 * Identifier or keyword. Any well-formed multi-byte character is accepted;
 * a malformed one ends the identifier, or is reported when it comes first.
 */
export function scanIdent(ctx: ScanContext): Token {
	const start = ctx.location()
	const lead = ctx.current()

	if (lead !== undefined && isMultiByteLead(lead)) {
		const length = ctx.sequenceLength()
		if (length === 0) {
			ctx.reportError(LexerErrorCode.InvalidUtf8Sequence, start, 1, { byte: hexByte(lead) })
			ctx.advance()
			return ctx.makeUnknown(start)
		}
		ctx.advance(length)
	} else {
		ctx.advance()
	}

	for (;;) {
		const byte = ctx.current()
		if (isAsciiIdentContinue(byte)) {
			ctx.advance()
			continue
		}
		if (byte === undefined || !isMultiByteLead(byte)) break
		const length = ctx.sequenceLength()
		if (length === 0) break
		ctx.advance(length)
	}

	const kind = lookupKeyword(ctx.textFrom(start.offset)) ?? TokenKind.Identifier
	return ctx.makeToken(kind, start)
}
