import { Chalk, type ChalkInstance, type ForegroundColorName } from 'chalk'
import type { Diagnostic } from '../diagnostic.ts'
import { type MarkdownStyle, renderMarkdown } from '../markdown.ts'
import type { SourceLocator } from '../source-locator.ts'
import { Level, levelToString } from '../types.ts'

export interface AnsiStyle {
	readonly enabled: boolean
	readonly errorColor: ForegroundColorName
	readonly warningColor: ForegroundColorName
	readonly noteColor: ForegroundColorName
	readonly helpColor: ForegroundColorName
	readonly codeColor: ForegroundColorName
	readonly lineNumColor: ForegroundColorName
}

export function defaultStyle(): AnsiStyle {
	return {
		codeColor: 'cyan',
		enabled: true,
		errorColor: 'redBright',
		helpColor: 'greenBright',
		lineNumColor: 'blue',
		noteColor: 'cyanBright',
		warningColor: 'yellowBright',
	}
}

export function noColorStyle(): AnsiStyle {
	return { ...defaultStyle(), enabled: false }
}

/**
 * Renders diagnostics as rustc-style text.
 *
 * ```
 * error[L1012]: unterminated string literal
 *   --> main.cz:1:9
 *    |
 *  1 | let s = "oops
 *    |         ^^^^^ string starts here
 *   = help: add a closing `"`
 * ```
 */
export class AnsiRenderer {
	readonly style: AnsiStyle
	private readonly chalk: ChalkInstance

	constructor(style: AnsiStyle = defaultStyle()) {
		this.style = style
		this.chalk = new Chalk({ level: style.enabled ? 1 : 0 })
	}

	wrapColor(text: string, color: ForegroundColorName): string {
		return this.chalk[color](text)
	}

	wrapBold(text: string): string {
		return this.chalk.bold(text)
	}

	levelColor(level: Level): ForegroundColorName {
		switch (level) {
			case Level.Note:
				return this.style.noteColor
			case Level.Help:
				return this.style.helpColor
			case Level.Warning:
				return this.style.warningColor
			default:
				return this.style.errorColor
		}
	}

	private markdownStyle(): MarkdownStyle {
		const { chalk, style } = this
		return {
			code: (text) => (style.enabled ? chalk[style.codeColor](text) : `\`${text}\``),
			codeBlock: (text) => chalk[style.codeColor](text),
			emphasis: (text) => chalk.italic(text),
			link: (text) => chalk.blue.underline(text),
			strong: (text) => chalk.bold(text),
		}
	}

	/** Render a Markdown message for the terminal. */
	renderMessage(markdown: string): string {
		return renderMarkdown(markdown, this.markdownStyle())
	}

	renderDiagnostic(diagnostic: Diagnostic, locator: SourceLocator | null): string {
		const color = this.levelColor(diagnostic.level)
		let out = this.wrapBold(this.wrapColor(levelToString(diagnostic.level), color))
		if (diagnostic.code !== null) {
			out += this.wrapBold(this.wrapColor(`[${diagnostic.code.toString()}]`, color))
		}
		out += `${this.wrapBold(':')} ${this.renderMessage(diagnostic.message.markdown)}\n`

		const primary = diagnostic.spans.primary()
		if (primary !== undefined && locator !== null) {
			const { span } = primary
			const lc = locator.getLineColumn(span.fileId, span.start)
			out += `  ${this.wrapColor('-->', this.style.lineNumColor)} ${locator.getFilename(span)}:${lc.line}:${lc.column}\n`
			out += this.renderSourceSnippet(diagnostic, locator)
		}

		for (const child of diagnostic.children) {
			const childLevel = this.wrapBold(this.wrapColor(levelToString(child.level), this.levelColor(child.level)))
			out += `  = ${childLevel}: ${this.renderMessage(child.message)}\n`
		}

		for (const suggestion of diagnostic.suggestions) {
			out += `  = ${this.wrapBold(this.wrapColor('help', this.style.helpColor))}: ${this.renderMessage(suggestion.message)}`
			if (suggestion.replacement !== '') {
				out += `: ${this.wrapColor(`\`${suggestion.replacement}\``, this.style.codeColor)}`
			}
			out += '\n'
		}

		return out
	}

	/**
	 * Three-line snippet under the primary span. Empty when the line cannot be resolved.
	 */
	renderSourceSnippet(diagnostic: Diagnostic, locator: SourceLocator): string {
		const primary = diagnostic.spans.primary()
		if (primary === undefined) return ''

		const { span } = primary
		const lc = locator.getLineColumn(span.fileId, span.start)
		const lineContent = locator.getLineContent(span.fileId, lc.line)
		if (lineContent === '') return ''

		const lineNum = String(lc.line)
		const margin = ' '.repeat(lineNum.length)
		const bar = this.wrapColor('|', this.style.lineNumColor)
		const column = Math.max(lc.column, 1)

		const lineChars = [...lineContent].length
		const spanChars = [...locator.getSourceSlice(span).split(/\r?\n|\r/)[0] ?? ''].length
		const caretCount = Math.max(1, Math.min(spanChars, lineChars - column + 1))
		const color = this.levelColor(diagnostic.level)

		let annotation = `${' '.repeat(column - 1)}${this.wrapColor('^'.repeat(caretCount), color)}`
		if (primary.label !== '') {
			annotation += ` ${this.wrapColor(primary.label, color)}`
		}

		return [
			` ${margin} ${bar}\n`,
			` ${this.wrapColor(lineNum, this.style.lineNumColor)} ${bar} ${lineContent}\n`,
			` ${margin} ${bar} ${annotation}\n`,
		].join('')
	}
}
