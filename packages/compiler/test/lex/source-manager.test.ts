import assert from 'node:assert'
import { describe, it } from 'node:test'
import { bufferId, expansionId, INVALID_BUFFER } from '../../src/core/tokens.ts'
import { SourceManager } from '../../src/lex/source-manager.ts'

describe('lex/source-manager', () => {
	describe('buffers', () => {
		it('should hand out ids starting at 1', () => {
			const sm = new SourceManager()
			const a = sm.addBuffer('a', 'a.cz')
			const b = sm.addBuffer('b', 'b.cz')

			assert.strictEqual(a, 1)
			assert.strictEqual(b, 2)
			assert.strictEqual(sm.bufferCount(), 2)
			assert.strictEqual(sm.isValid(a), true)
			assert.strictEqual(sm.isValid(INVALID_BUFFER), false)
			assert.strictEqual(sm.isValid(bufferId(3)), false)
		})

		it('should store text as UTF-8 bytes', () => {
			const sm = new SourceManager()
			const id = sm.addBuffer('é', 'u.cz')
			assert.deepStrictEqual([...sm.getSource(id)], [0xc3, 0xa9])
			assert.strictEqual(sm.getText(id), 'é')
		})

		it('should accept raw bytes', () => {
			const sm = new SourceManager()
			const id = sm.addBuffer(new Uint8Array([0x61, 0x62]), 'b.cz')
			assert.strictEqual(sm.getText(id), 'ab')
		})

		it('should return empty values for invalid handles', () => {
			const sm = new SourceManager()
			assert.strictEqual(sm.getSource(bufferId(7)).length, 0)
			assert.strictEqual(sm.getFilename(bufferId(7)), '')
			assert.strictEqual(sm.slice(bufferId(7), 0, 3), '')
			assert.strictEqual(sm.getLineContent(bufferId(7), 1), '')
			assert.strictEqual(sm.lineCount(bufferId(7)), 0)
			assert.strictEqual(sm.isSynthetic(bufferId(7)), false)
		})
	})

	describe('slice', () => {
		it('should clamp ranges to the buffer', () => {
			const sm = new SourceManager()
			const id = sm.addBuffer('hello', 'h.cz')
			assert.strictEqual(sm.slice(id, 1, 3), 'ell')
			assert.strictEqual(sm.slice(id, 3, 100), 'lo')
			assert.strictEqual(sm.slice(id, 5, 1), '')
			assert.strictEqual(sm.slice(id, 0, 0), '')
		})
	})

	describe('lines', () => {
		it('should split on LF, CRLF and lone CR', () => {
			const sm = new SourceManager()
			const id = sm.addBuffer('a\nb\r\nc\rd', 'l.cz')
			assert.strictEqual(sm.lineCount(id), 4)
			assert.strictEqual(sm.getLineContent(id, 1), 'a')
			assert.strictEqual(sm.getLineContent(id, 2), 'b')
			assert.strictEqual(sm.getLineContent(id, 3), 'c')
			assert.strictEqual(sm.getLineContent(id, 4), 'd')
		})

		it('should give empty content for line 0 and past the end', () => {
			const sm = new SourceManager()
			const id = sm.addBuffer('one\ntwo', 'l.cz')
			assert.strictEqual(sm.getLineContent(id, 0), '')
			assert.strictEqual(sm.getLineContent(id, 3), '')
		})

		it('should open an empty last line after a trailing newline', () => {
			const sm = new SourceManager()
			const id = sm.addBuffer('x\n', 'l.cz')
			assert.strictEqual(sm.lineCount(id), 2)
			assert.strictEqual(sm.getLineContent(id, 2), '')
			assert.strictEqual(sm.lineStart(id, 2), 2)
		})

		it('should map offsets to line and character column', () => {
			const sm = new SourceManager()
			const id = sm.addBuffer('ab\néx', 'l.cz')
			assert.deepStrictEqual(sm.lineColumn(id, 0), { column: 1, line: 1 })
			assert.deepStrictEqual(sm.lineColumn(id, 2), { column: 3, line: 1 })
			assert.deepStrictEqual(sm.lineColumn(id, 3), { column: 1, line: 2 })
			// 'é' is two bytes, one column
			assert.deepStrictEqual(sm.lineColumn(id, 5), { column: 2, line: 2 })
			assert.deepStrictEqual(sm.lineColumn(id, 6), { column: 3, line: 2 })
			assert.strictEqual(sm.lineColumn(id, 7), undefined)
		})
	})

	describe('synthetic buffers', () => {
		it('should record the parent chain', () => {
			const sm = new SourceManager()
			const root = sm.addBuffer('root', 'main.cz')
			const child = sm.addSyntheticBuffer('x', '<macro>', root)

			assert.strictEqual(sm.isSynthetic(child), true)
			assert.strictEqual(sm.isSynthetic(root), false)
			assert.strictEqual(sm.getParentBuffer(child), root)
			assert.deepStrictEqual(sm.getFileChain(child), ['<macro>', 'main.cz'])
		})

		it('should record an invalid parent as none', () => {
			const sm = new SourceManager()
			const orphan = sm.addSyntheticBuffer('x', '<gen>', bufferId(42))
			assert.strictEqual(sm.getParentBuffer(orphan), null)
			assert.deepStrictEqual(sm.getFileChain(orphan), ['<gen>'])
		})
	})

	describe('expansion info', () => {
		it('should store and return expansion records', () => {
			const sm = new SourceManager()
			const buffer = sm.addBuffer('m!()', 'main.cz')
			const id = sm.addExpansionInfo({
				callSite: { buffer, column: 1, line: 1, offset: 0 },
				macroDefBuffer: buffer,
				macroNameLength: 1,
				macroNameOffset: 0,
				parent: null,
			})

			assert.strictEqual(id, 1)
			assert.strictEqual(sm.getExpansionInfo(id)?.macroNameLength, 1)
			assert.strictEqual(sm.getExpansionInfo(expansionId(0)), undefined)
			assert.strictEqual(sm.getExpansionInfo(expansionId(2)), undefined)
		})
	})
})
