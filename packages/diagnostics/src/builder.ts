import type { DiagContext } from './context.ts'
import { Applicability, type Diagnostic, type SubDiagnostic, type Suggestion } from './diagnostic.ts'
import type { ErrorCode } from './error-code.ts'
import type { ErrorGuaranteed } from './error-guaranteed.ts'
import { Message } from './message.ts'
import { MultiSpan, type Span } from './span.ts'
import { Level } from './types.ts'

/**
 * Fluent construction of a Diagnostic.
 *
 * Example:
 * ```
 * error(code, 'unterminated string literal')
 *   .spanLabel(span, 'string starts here')
 *   .help('add a closing `"`')
 *   .emitError(dcx)
 * ```
 */
export class DiagBuilder {
	private errorCode: ErrorCode | null
	private readonly spans = new MultiSpan()
	private readonly children: SubDiagnostic[] = []
	private readonly suggestions: Suggestion[] = []

	constructor(
		private readonly level: Level,
		private readonly message: Message,
		code: ErrorCode | null = null
	) {
		this.errorCode = code
	}

	code(code: ErrorCode): this {
		this.errorCode = code
		return this
	}

	span(span: Span): this {
		this.spans.addPrimary(span, '')
		return this
	}

	spanLabel(span: Span, label: string): this {
		this.spans.addPrimary(span, label)
		return this
	}

	secondarySpan(span: Span, label = ''): this {
		this.spans.addSecondary(span, label)
		return this
	}

	note(message: string, span?: Span): this {
		return this.child(Level.Note, message, span)
	}

	help(message: string, span?: Span): this {
		return this.child(Level.Help, message, span)
	}

	suggestion(
		span: Span,
		replacement: string,
		message: string,
		applicability: Applicability = Applicability.Unspecified
	): this {
		this.suggestions.push({ applicability, message, replacement, span })
		return this
	}

	build(): Diagnostic {
		return {
			children: [...this.children],
			code: this.errorCode,
			level: this.level,
			message: this.message,
			spans: this.spans.clone(),
			suggestions: [...this.suggestions],
		}
	}

	emit(dcx: DiagContext): void {
		dcx.emit(this.build())
	}

	emitError(dcx: DiagContext): ErrorGuaranteed {
		return dcx.emitError(this.build())
	}

	private child(level: Level, message: string, span: Span | undefined): this {
		this.children.push(span === undefined ? { level, message } : { level, message, span })
		return this
	}
}

function toMessage(message: Message | string): Message {
	return typeof message === 'string' ? new Message(message) : message
}

export function error(message: Message | string, code: ErrorCode | null = null): DiagBuilder {
	return new DiagBuilder(Level.Error, toMessage(message), code)
}

export function warning(message: Message | string, code: ErrorCode | null = null): DiagBuilder {
	return new DiagBuilder(Level.Warning, toMessage(message), code)
}

export function note(message: Message | string): DiagBuilder {
	return new DiagBuilder(Level.Note, toMessage(message))
}

export function help(message: Message | string): DiagBuilder {
	return new DiagBuilder(Level.Help, toMessage(message))
}

/** Internal compiler error. */
export function bug(message: Message | string): DiagBuilder {
	return new DiagBuilder(Level.Bug, toMessage(message))
}

export function fatal(message: Message | string, code: ErrorCode | null = null): DiagBuilder {
	return new DiagBuilder(Level.Fatal, toMessage(message), code)
}
