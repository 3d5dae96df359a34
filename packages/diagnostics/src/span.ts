/**
 * Byte-range addressing for diagnostics.
 * A span never owns text; a SourceLocator resolves it.
 */

export interface Span {
	/** Buffer handle; 0 means "no location" */
	readonly fileId: number
	/** Start byte offset (inclusive) */
	readonly start: number
	/** End byte offset (exclusive) */
	readonly end: number
}

export const INVALID_SPAN: Span = { end: 0, fileId: 0, start: 0 }

export function createSpan(fileId: number, start: number, end: number): Span {
	return { end: Math.max(start, end), fileId, start }
}

export function isValidSpan(span: Span): boolean {
	return span.fileId !== 0
}

export function spanLength(span: Span): number {
	return span.end - span.start
}

/**
 * Smallest span covering both inputs.
 * An invalid side yields the other; spans from different files yield `a`.
 */
export function mergeSpans(a: Span, b: Span): Span {
	if (!isValidSpan(a)) return b
	if (!isValidSpan(b)) return a
	if (a.fileId !== b.fileId) return a
	return createSpan(a.fileId, Math.min(a.start, b.start), Math.max(a.end, b.end))
}

export interface LabeledSpan {
	readonly span: Span
	readonly label: string
	readonly primary: boolean
}

/**
 * Ordered labeled spans. At most the first span is primary.
 */
export class MultiSpan {
	private readonly entries: LabeledSpan[] = []

	/** Adds the primary span; once a primary exists, further calls add secondaries. */
	addPrimary(span: Span, label = ''): void {
		if (this.primary() !== undefined) {
			this.addSecondary(span, label)
			return
		}
		this.entries.unshift({ label, primary: true, span })
	}

	addSecondary(span: Span, label = ''): void {
		this.entries.push({ label, primary: false, span })
	}

	primary(): LabeledSpan | undefined {
		const first = this.entries[0]
		return first?.primary ? first : undefined
	}

	secondaries(): LabeledSpan[] {
		return this.entries.filter((entry) => !entry.primary)
	}

	all(): readonly LabeledSpan[] {
		return this.entries
	}

	isEmpty(): boolean {
		return this.entries.length === 0
	}

	get size(): number {
		return this.entries.length
	}

	clone(): MultiSpan {
		const copy = new MultiSpan()
		copy.entries.push(...this.entries)
		return copy
	}
}
