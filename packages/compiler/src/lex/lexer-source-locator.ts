/**
 * Bridge from lexer errors to the diagnostics engine.
 */

import {
	createSpan,
	type DiagContext,
	type Diagnostic,
	error,
	ErrorCategory,
	ErrorCode,
	getLexerError,
	type LineColumn,
	Message,
	type SourceLocator,
	type Span,
	type Translator,
} from '@corvid/diagnostics'
import { bufferId } from '../core/tokens.ts'
import type { LexerError } from './lexer-error.ts'
import type { SourceManager } from './source-manager.ts'

const MAX_SLICE = 0xffff

/**
 * SourceLocator over a SourceManager; span file ids are buffer ids.
 */
export class LexerSourceLocator implements SourceLocator {
	constructor(private readonly sm: SourceManager) {}

	getFilename(span: Span): string {
		return this.sm.getFilename(bufferId(span.fileId))
	}

	getLineColumn(fileId: number, offset: number): LineColumn {
		const id = bufferId(fileId)
		if (this.sm.getSource(id).length === 0) return { column: 0, line: 0 }
		return this.sm.lineColumn(id, offset) ?? { column: 0, line: 0 }
	}

	getLineContent(fileId: number, line: number): string {
		return this.sm.getLineContent(bufferId(fileId), line)
	}

	/** Text under the span, capped at 65535 bytes. */
	getSourceSlice(span: Span): string {
		const length = Math.min(MAX_SLICE, span.end - span.start)
		return this.sm.slice(bufferId(span.fileId), span.start, length)
	}
}

export function toSpan(err: LexerError): Span {
	return createSpan(err.location.buffer, err.location.offset, err.location.offset + err.length)
}

/**
 * Error-level diagnostic with the error's message, a label on its span and a
 * help line, both looked up under the error's resource key.
 */
export function toDiagnostic(err: LexerError, translator: Translator): Diagnostic {
	const { key } = getLexerError(err.code)
	const builder = error(Message.text(err.message), new ErrorCode(ErrorCategory.Lexer, err.code)).spanLabel(
		toSpan(err),
		translator.get(`${key}.label`)
	)
	const help = translator.get(`${key}.help`)
	if (help !== '') builder.help(help)
	return builder.build()
}

/** Install a locator for `sm` on the context and emit every error in order. */
export function emitLexerErrors(dcx: DiagContext, errors: readonly LexerError[], sm: SourceManager): void {
	dcx.setLocator(new LexerSourceLocator(sm))
	for (const err of errors) {
		dcx.emit(toDiagnostic(err, dcx.translator))
	}
}
