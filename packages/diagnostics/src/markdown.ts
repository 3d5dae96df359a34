/**
 * Renders the Markdown subset used in diagnostic messages.
 * Parsing is done by mdast-util-from-markdown; styling is pluggable so the
 * same walk serves plain text and ANSI output.
 */

import type { Nodes } from 'mdast'
import { fromMarkdown } from 'mdast-util-from-markdown'

export interface MarkdownStyle {
	code(text: string): string
	strong(text: string): string
	emphasis(text: string): string
	link(text: string): string
	codeBlock(text: string): string
}

export const PLAIN_STYLE: MarkdownStyle = {
	code: (text) => text,
	codeBlock: (text) => text,
	emphasis: (text) => text,
	link: (text) => text,
	strong: (text) => text,
}

const CODE_BLOCK_INDENT = '    '

function indentLines(text: string): string {
	return text
		.split('\n')
		.map((line) => `${CODE_BLOCK_INDENT}${line}`)
		.join('\n')
}

function renderAll(nodes: readonly Nodes[], style: MarkdownStyle, separator: string): string {
	return nodes.map((child) => renderNode(child, style)).join(separator)
}

function renderNode(node: Nodes, style: MarkdownStyle): string {
	switch (node.type) {
		case 'root':
		case 'blockquote':
		case 'listItem':
			return renderAll(node.children, style, '\n')
		case 'list':
			return node.children.map((item) => `- ${renderNode(item, style)}`).join('\n')
		case 'paragraph':
			return renderAll(node.children, style, '')
		case 'heading':
			return style.strong(renderAll(node.children, style, ''))
		case 'text':
		case 'html':
			return node.value
		case 'inlineCode':
			return style.code(node.value)
		case 'strong':
			return style.strong(renderAll(node.children, style, ''))
		case 'emphasis':
			return style.emphasis(renderAll(node.children, style, ''))
		case 'link':
			return style.link(renderAll(node.children, style, ''))
		case 'break':
			return '\n'
		case 'code':
			return style.codeBlock(indentLines(node.value))
		case 'thematicBreak':
			return ''
		default:
			if ('children' in node) return renderAll(node.children, style, '')
			if ('value' in node) return node.value
			return ''
	}
}

/**
 * Render Markdown with the given style. Trailing newlines are trimmed.
 */
export function renderMarkdown(markdown: string, style: MarkdownStyle = PLAIN_STYLE): string {
	if (markdown.length === 0) return ''
	return renderNode(fromMarkdown(markdown), style).replace(/\n+$/, '')
}

/**
 * Escape Markdown punctuation so `text` renders literally.
 */
export function escapeMarkdown(text: string): string {
	return text.replace(/[!-/:-@[-`{-~]/g, '\\$&')
}
