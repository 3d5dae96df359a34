/**
 * Lexical analysis: source arena, scanners and the lexer facade.
 */

export { Lexer } from './lexer.ts'
export {
	codeString,
	createLexerError,
	ErrorCollector,
	formatLexerError,
	getExpansionChain,
	type LexerError,
} from './lexer-error.ts'
export { emitLexerErrors, LexerSourceLocator, toDiagnostic, toSpan } from './lexer-source-locator.ts'
export { ScanContext, type TokenValue } from './scan-context.ts'
export { type ExpansionInfo, SourceManager } from './source-manager.ts'
export { SourceReader } from './source-reader.ts'
