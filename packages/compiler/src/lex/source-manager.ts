/**
 * Append-only arena owning every source buffer of a compilation.
 *
 * Buffers are stored as UTF-8 bytes and addressed by BufferId. Accessors never
 * throw on a bad handle or range: they return an empty value, which callers
 * treat as "nothing to show".
 */

import {
	type BufferId,
	bufferId,
	type ExpansionId,
	expansionId,
	type SourceLocation,
	type TextSource,
} from '../core/tokens.ts'

const LF = 0x0a
const CR = 0x0d

const encoder = new TextEncoder()
const decoder = new TextDecoder()
const EMPTY = new Uint8Array(0)

interface BufferRecord {
	readonly bytes: Uint8Array
	readonly name: string
	readonly synthetic: boolean
	readonly parent: BufferId | null
	/** Byte offset of each line start, built on first line query */
	lineStarts: number[] | null
}

/**
 * Where a macro was invoked and defined. Recorded but not yet interpreted.
 */
export interface ExpansionInfo {
	readonly callSite: SourceLocation
	readonly macroDefBuffer: BufferId
	readonly macroNameOffset: number
	readonly macroNameLength: number
	/** Enclosing expansion for nested macros */
	readonly parent: ExpansionId | null
}

function toBytes(text: string | Uint8Array): Uint8Array {
	return typeof text === 'string' ? encoder.encode(text) : text
}

/** Line starts for `\n`, `\r\n` and lone `\r` terminators. */
function computeLineStarts(bytes: Uint8Array): number[] {
	const starts = [0]
	for (let i = 0; i < bytes.length; i++) {
		const byte = bytes[i]
		if (byte === LF || (byte === CR && bytes[i + 1] !== LF)) {
			starts.push(i + 1)
		}
	}
	return starts
}

export class SourceManager implements TextSource {
	private readonly buffers: BufferRecord[] = []
	private readonly expansions: ExpansionInfo[] = []

	addBuffer(text: string | Uint8Array, name: string): BufferId {
		return this.push({ bytes: toBytes(text), lineStarts: null, name, parent: null, synthetic: false })
	}

	/**
	 * Add derived text (e.g. a future macro expansion). An invalid parent is
	 * recorded as no parent.
	 */
	addSyntheticBuffer(text: string | Uint8Array, name: string, parent: BufferId): BufferId {
		return this.push({
			bytes: toBytes(text),
			lineStarts: null,
			name,
			parent: this.isValid(parent) ? parent : null,
			synthetic: true,
		})
	}

	isValid(id: BufferId): boolean {
		return id > 0 && id <= this.buffers.length
	}

	bufferCount(): number {
		return this.buffers.length
	}

	getSource(id: BufferId): Uint8Array {
		return this.record(id)?.bytes ?? EMPTY
	}

	/** Whole buffer decoded as text. */
	getText(id: BufferId): string {
		return decoder.decode(this.getSource(id))
	}

	/** Bytes of `[offset, offset + length)`, clamped to the buffer. */
	sliceBytes(id: BufferId, offset: number, length: number): Uint8Array {
		const bytes = this.getSource(id)
		if (offset < 0 || offset >= bytes.length || length <= 0) return EMPTY
		return bytes.subarray(offset, Math.min(bytes.length, offset + length))
	}

	slice(id: BufferId, offset: number, length: number): string {
		return decoder.decode(this.sliceBytes(id, offset, length))
	}

	getFilename(id: BufferId): string {
		return this.record(id)?.name ?? ''
	}

	isSynthetic(id: BufferId): boolean {
		return this.record(id)?.synthetic ?? false
	}

	getParentBuffer(id: BufferId): BufferId | null {
		return this.record(id)?.parent ?? null
	}

	/** Number of lines; a trailing terminator opens one more, empty line. */
	lineCount(id: BufferId): number {
		const record = this.record(id)
		return record === undefined ? 0 : this.lineStarts(record).length
	}

	/** Byte offset where 1-based `line` starts, or undefined past the end. */
	lineStart(id: BufferId, line: number): number | undefined {
		const record = this.record(id)
		if (record === undefined || line < 1) return undefined
		return this.lineStarts(record)[line - 1]
	}

	/**
	 * 1-based line and character column of a byte offset. The offset just past
	 * the last byte is accepted; anything further gives undefined.
	 */
	lineColumn(id: BufferId, offset: number): { line: number; column: number } | undefined {
		const record = this.record(id)
		if (record === undefined || offset < 0 || offset > record.bytes.length) return undefined

		const starts = this.lineStarts(record)
		let low = 0
		let high = starts.length - 1
		while (low < high) {
			const mid = (low + high + 1) >> 1
			if ((starts[mid] ?? 0) <= offset) low = mid
			else high = mid - 1
		}

		let column = 1
		for (let i = starts[low] ?? 0; i < offset; i++) {
			const byte = record.bytes[i]
			if (byte !== undefined && (byte & 0xc0) !== 0x80) column++
		}
		return { column, line: low + 1 }
	}

	/** Text of 1-based `line` without its terminator. */
	getLineContent(id: BufferId, line: number): string {
		const record = this.record(id)
		if (record === undefined || line < 1) return ''

		const starts = this.lineStarts(record)
		const start = starts[line - 1]
		if (start === undefined) return ''

		const { bytes } = record
		let end = starts[line] ?? bytes.length
		if (end > start && bytes[end - 1] === LF) end--
		if (end > start && bytes[end - 1] === CR) end--
		return decoder.decode(bytes.subarray(start, end))
	}

	/** Names from `id` outwards through its parents. */
	getFileChain(id: BufferId): string[] {
		const chain: string[] = []
		let current: BufferId | null = id
		while (current !== null) {
			const record = this.record(current)
			if (record === undefined) break
			chain.push(record.name)
			current = record.parent
		}
		return chain
	}

	addExpansionInfo(info: ExpansionInfo): ExpansionId {
		this.expansions.push(info)
		return expansionId(this.expansions.length)
	}

	getExpansionInfo(id: ExpansionId): ExpansionInfo | undefined {
		return id > 0 ? this.expansions[id - 1] : undefined
	}

	private push(record: BufferRecord): BufferId {
		this.buffers.push(record)
		return bufferId(this.buffers.length)
	}

	private record(id: BufferId): BufferRecord | undefined {
		return id > 0 ? this.buffers[id - 1] : undefined
	}

	private lineStarts(record: BufferRecord): number[] {
		if (record.lineStarts === null) {
			record.lineStarts = computeLineStarts(record.bytes)
		}
		return record.lineStarts
	}
}
