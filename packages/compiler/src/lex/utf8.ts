/**
 * UTF-8 byte classification and decoding over Uint8Array.
 */

export function isContinuationByte(byte: number): boolean {
	return (byte & 0xc0) === 0x80
}

/** Lead bytes that can start a well-formed multi-byte sequence. */
export function isMultiByteLead(byte: number): boolean {
	return byte >= 0xc2 && byte <= 0xf4
}

/** Sequence length implied by a lead byte; 0 for bytes that cannot lead. */
export function charLength(lead: number): number {
	if (lead < 0x80) return 1
	if (lead < 0xc2) return 0
	if (lead < 0xe0) return 2
	if (lead < 0xf0) return 3
	if (lead <= 0xf4) return 4
	return 0
}

export function isAsciiDigit(byte: number | undefined): boolean {
	return byte !== undefined && byte >= 0x30 && byte <= 0x39
}

export function isAsciiLetter(byte: number | undefined): boolean {
	return byte !== undefined && ((byte >= 0x41 && byte <= 0x5a) || (byte >= 0x61 && byte <= 0x7a))
}

export function isHexDigit(byte: number | undefined): boolean {
	return isAsciiDigit(byte) || (byte !== undefined && ((byte >= 0x41 && byte <= 0x46) || (byte >= 0x61 && byte <= 0x66)))
}

export function isAsciiIdentStart(byte: number | undefined): boolean {
	return isAsciiLetter(byte) || byte === 0x5f
}

export function isAsciiIdentContinue(byte: number | undefined): boolean {
	return isAsciiIdentStart(byte) || isAsciiDigit(byte)
}

/**
 * Length of the sequence at `pos` when its lead byte is a multi-byte lead
 * and enough continuation bytes follow; 0 otherwise.
 */
export function sequenceLength(bytes: Uint8Array, pos: number): number {
	const lead = bytes[pos]
	if (lead === undefined || !isMultiByteLead(lead)) return 0
	const len = charLength(lead)
	for (let i = 1; i < len; i++) {
		const next = bytes[pos + i]
		if (next === undefined || !isContinuationByte(next)) return 0
	}
	return len
}

export interface DecodedChar {
	readonly codePoint: number
	readonly length: number
}

/**
 * Strictly decode one character at `pos`, rejecting overlong forms,
 * surrogates and values above U+10FFFF.
 */
export function decodeChar(bytes: Uint8Array, pos: number): DecodedChar | undefined {
	const lead = bytes[pos]
	if (lead === undefined) return undefined
	if (lead < 0x80) return { codePoint: lead, length: 1 }

	const length = sequenceLength(bytes, pos)
	if (length === 0) return undefined

	let codePoint = lead & (0xff >> (length + 1))
	for (let i = 1; i < length; i++) {
		codePoint = (codePoint << 6) | ((bytes[pos + i] ?? 0) & 0x3f)
	}

	const minimum = length === 3 ? 0x800 : length === 4 ? 0x10000 : 0x80
	if (codePoint < minimum || codePoint > 0x10ffff) return undefined
	if (codePoint >= 0xd800 && codePoint <= 0xdfff) return undefined
	return { codePoint, length }
}

export function isValidUtf8(bytes: Uint8Array): boolean {
	return charCount(bytes) !== undefined
}

/** Number of characters, or undefined when the bytes are not valid UTF-8. */
export function charCount(bytes: Uint8Array): number | undefined {
	let count = 0
	let pos = 0
	while (pos < bytes.length) {
		const decoded = decodeChar(bytes, pos)
		if (decoded === undefined) return undefined
		pos += decoded.length
		count++
	}
	return count
}

/** UTF-8 bytes of a Unicode scalar value; empty for anything else. */
export function encodeCodePoint(codePoint: number): Uint8Array {
	if (!isUnicodeScalar(codePoint)) return new Uint8Array(0)
	return new TextEncoder().encode(String.fromCodePoint(codePoint))
}

export function isUnicodeScalar(codePoint: number): boolean {
	return Number.isInteger(codePoint) && codePoint >= 0 && codePoint <= 0x10ffff && (codePoint < 0xd800 || codePoint > 0xdfff)
}

const XID_START = /^\p{XID_Start}$/u
const XID_CONTINUE = /^\p{XID_Continue}$/u

export function isIdentStart(codePoint: number): boolean {
	if (codePoint < 0x80) return isAsciiIdentStart(codePoint)
	return isUnicodeScalar(codePoint) && XID_START.test(String.fromCodePoint(codePoint))
}

export function isIdentContinue(codePoint: number): boolean {
	if (codePoint < 0x80) return isAsciiIdentContinue(codePoint)
	return isUnicodeScalar(codePoint) && XID_CONTINUE.test(String.fromCodePoint(codePoint))
}
