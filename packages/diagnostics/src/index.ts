/**
 * @corvid/diagnostics
 *
 * Structured diagnostics for the Corvid compiler: spans, error codes,
 * Markdown messages, the emission context, emitters and localization.
 */

export { bug, DiagBuilder, error, fatal, help, note, warning } from './builder.ts'
export { DEFAULT_DIAG_CONFIG, type DiagConfig, DiagContext, type DiagContextOptions } from './context.ts'
export {
	Applicability,
	createDiagnostic,
	type Diagnostic,
	type SubDiagnostic,
	type Suggestion,
	withLevel,
} from './diagnostic.ts'
export { D0001, D0002, D0003, D0010, DRIVER_ERRORS } from './driver.ts'
export type { Emitter, OutputSink } from './emitter.ts'
export { AnsiRenderer, type AnsiStyle, defaultStyle, noColorStyle } from './emitters/ansi-renderer.ts'
export { type JsonDocument, JsonEmitter, type JsonEmitterOptions } from './emitters/json-emitter.ts'
export { TextEmitter } from './emitters/text-emitter.ts'
export {
	categoryPrefix,
	ErrorCategory,
	ErrorCode,
	type ErrorEntry,
	ErrorRegistry,
	parseErrorCode,
} from './error-code.ts'
export type { ErrorGuaranteed } from './error-guaranteed.ts'
export {
	defaultSearchPaths,
	findResourceDirectory,
	isLocale,
	Locale,
	loadDefaultResources,
	parseLocale,
	TranslationScope,
	Translator,
	withLocale,
} from './i18n.ts'
export { interpolateMessage } from './interpolate.ts'
export { getLexerError, LEXER_ERRORS, LexerErrorCode } from './lexer.ts'
export { escapeMarkdown, type MarkdownStyle, PLAIN_STYLE, renderMarkdown } from './markdown.ts'
export { Message } from './message.ts'
export type { LineColumn, SourceLocator } from './source-locator.ts'
export {
	createSpan,
	INVALID_SPAN,
	isValidSpan,
	type LabeledSpan,
	mergeSpans,
	MultiSpan,
	type Span,
	spanLength,
} from './span.ts'
export { type DiagnosticStats, StatsCounter } from './stats.ts'
export { type DiagnosticArgs, type ErrorDef, isErrorLevel, Level, levelToString } from './types.ts'
