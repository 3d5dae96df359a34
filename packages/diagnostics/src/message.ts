import { escapeMarkdown, renderMarkdown } from './markdown.ts'

/**
 * Diagnostic message text in a lightweight Markdown subset.
 */
export class Message {
	readonly markdown: string
	private plain: string | null = null

	constructor(markdown: string) {
		this.markdown = markdown
	}

	/** Message whose text renders literally, with no Markdown interpretation. */
	static text(plain: string): Message {
		return new Message(escapeMarkdown(plain))
	}

	renderPlainText(): string {
		if (this.plain === null) {
			this.plain = renderMarkdown(this.markdown)
		}
		return this.plain
	}

	isEmpty(): boolean {
		return this.markdown.length === 0
	}

	toString(): string {
		return this.renderPlainText()
	}
}
