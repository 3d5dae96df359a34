/**
 * Corvid compiler front end.
 *
 * Source text lives in a SourceManager; the Lexer turns one buffer into
 * tokens that refer back to it by byte range, collecting errors as it goes.
 *
 * ```
 * const sm = new SourceManager()
 * const buffer = sm.addBuffer('let x = 1', 'main.cz')
 * const lexer = new Lexer(sm, buffer)
 * const tokens = lexer.tokenize()
 * ```
 */

export * from './core/index.ts'
export * from './lex/index.ts'
