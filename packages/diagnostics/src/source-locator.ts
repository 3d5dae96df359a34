import type { Span } from './span.ts'

export interface LineColumn {
	/** 1-based; 0 when the offset cannot be resolved */
	readonly line: number
	/** 1-based; 0 when the offset cannot be resolved */
	readonly column: number
}

/**
 * Resolves spans back to source text. Implemented by whichever phase owns the
 * source storage, so the diagnostics engine never depends on it.
 */
export interface SourceLocator {
	getFilename(span: Span): string
	getLineColumn(fileId: number, offset: number): LineColumn
	getLineContent(fileId: number, line: number): string
	getSourceSlice(span: Span): string
}
