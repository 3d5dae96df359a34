import type { BufferId, SourceLocation } from '../core/tokens.ts'
import type { SourceManager } from './source-manager.ts'
import { isContinuationByte, sequenceLength } from './utf8.ts'

const LF = 0x0a
const CR = 0x0d

const decoder = new TextDecoder()

/**
 * Byte cursor over one buffer with line/column tracking.
 *
 * `\n` and a lone `\r` start a new line; the `\r` of `\r\n` leaves the
 * position to the `\n`. Columns count characters, so continuation bytes
 * do not advance them.
 */
export class SourceReader {
	readonly buffer: BufferId
	private readonly bytes: Uint8Array
	private position = 0
	private line = 1
	private column = 1

	constructor(sm: SourceManager, buffer: BufferId) {
		this.buffer = buffer
		this.bytes = sm.getSource(buffer)
	}

	get offset(): number {
		return this.position
	}

	get length(): number {
		return this.bytes.length
	}

	current(): number | undefined {
		return this.bytes[this.position]
	}

	peek(n: number): number | undefined {
		return this.bytes[this.position + n]
	}

	isAtEnd(): boolean {
		return this.position >= this.bytes.length
	}

	advance(count = 1): void {
		for (let i = 0; i < count && this.position < this.bytes.length; i++) {
			this.step()
		}
	}

	location(): SourceLocation {
		return { buffer: this.buffer, column: this.column, line: this.line, offset: this.position }
	}

	/** Length of the well-formed multi-byte sequence at the cursor, or 0. */
	sequenceLength(): number {
		return sequenceLength(this.bytes, this.position)
	}

	/** Bytes from `start` to the cursor. */
	bytesFrom(start: number): Uint8Array {
		if (start < 0 || start > this.position) return new Uint8Array(0)
		return this.bytes.subarray(start, this.position)
	}

	/** Text from `start` to the cursor. */
	textFrom(start: number): string {
		return decoder.decode(this.bytesFrom(start))
	}

	private step(): void {
		const byte = this.bytes[this.position]
		if (byte === LF) {
			this.line++
			this.column = 1
		} else if (byte === CR) {
			if (this.bytes[this.position + 1] !== LF) {
				this.line++
				this.column = 1
			}
		} else if (byte !== undefined && !isContinuationByte(byte)) {
			this.column++
		}
		this.position++
	}
}
