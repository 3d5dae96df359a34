import assert from 'node:assert'
import { describe, it } from 'node:test'
import { error, fatal, note, warning } from '../src/builder.ts'
import { DiagContext, type DiagContextOptions } from '../src/context.ts'
import { ErrorCategory, ErrorCode } from '../src/error-code.ts'
import { createSpan } from '../src/span.ts'
import { Level } from '../src/types.ts'
import { CollectingEmitter } from './helpers.ts'

const L1021 = new ErrorCode(ErrorCategory.Lexer, 1021)
const L1012 = new ErrorCode(ErrorCategory.Lexer, 1012)

function setup(options: DiagContextOptions = {}) {
	const emitter = new CollectingEmitter()
	return { dcx: new DiagContext(emitter, options), emitter }
}

describe('DiagContext', () => {
	describe('deduplication', () => {
		it('should drop a repeated diagnostic', () => {
			const { dcx, emitter } = setup()
			error('bad', L1021).span(createSpan(1, 4, 5)).emit(dcx)
			error('bad', L1021).span(createSpan(1, 4, 5)).emit(dcx)
			assert.strictEqual(emitter.diagnostics.length, 1)
			assert.strictEqual(dcx.errorCount(), 1)
		})

		it('should keep diagnostics that differ in position', () => {
			const { dcx, emitter } = setup()
			error('bad', L1021).span(createSpan(1, 4, 5)).emit(dcx)
			error('bad', L1021).span(createSpan(1, 6, 7)).emit(dcx)
			assert.strictEqual(emitter.diagnostics.length, 2)
		})

		it('should keep duplicates when disabled', () => {
			const { dcx, emitter } = setup({ config: { deduplicate: false } })
			dcx.warning('same')
			dcx.warning('same')
			assert.strictEqual(emitter.diagnostics.length, 2)
			assert.strictEqual(dcx.warningCount(), 2)
		})
	})

	describe('treatWarningsAsErrors', () => {
		it('should promote warnings to errors', () => {
			const { dcx, emitter } = setup({ config: { treatWarningsAsErrors: true } })
			warning('unused binding').emit(dcx)
			assert.strictEqual(emitter.diagnostics[0]?.level, Level.Error)
			assert.strictEqual(dcx.errorCount(), 1)
			assert.strictEqual(dcx.warningCount(), 0)
			assert.strictEqual(dcx.hasErrors(), true)
		})

		it('should leave notes alone', () => {
			const { dcx } = setup({ config: { treatWarningsAsErrors: true } })
			note('fyi').emit(dcx)
			assert.strictEqual(dcx.noteCount(), 1)
			assert.strictEqual(dcx.errorCount(), 0)
		})
	})

	describe('maxErrors', () => {
		it('should count but not forward errors past the limit', () => {
			const { dcx, emitter } = setup({ config: { maxErrors: 2 } })
			dcx.error('one')
			assert.strictEqual(dcx.shouldAbort(), false)
			dcx.error('two')
			assert.strictEqual(dcx.shouldAbort(), true)
			dcx.error('three')
			assert.strictEqual(emitter.diagnostics.length, 2)
			assert.strictEqual(dcx.errorCount(), 3)
		})

		it('should never abort with no limit', () => {
			const { dcx } = setup()
			for (let i = 0; i < 50; i++) dcx.error(`error ${i}`)
			assert.strictEqual(dcx.shouldAbort(), false)
		})
	})

	describe('fatal', () => {
		it('should count as an error and request abort', () => {
			const { dcx } = setup()
			fatal('cannot continue').emit(dcx)
			assert.strictEqual(dcx.hadFatal(), true)
			assert.strictEqual(dcx.errorCount(), 1)
			assert.strictEqual(dcx.shouldAbort(), true)
		})
	})

	describe('emit helpers', () => {
		it('should raise emitError below error level to error', () => {
			const { dcx, emitter } = setup()
			dcx.emitError(warning('w').build())
			assert.strictEqual(emitter.diagnostics[0]?.level, Level.Error)
		})

		it('should force levels in emitWarning and emitNote', () => {
			const { dcx, emitter } = setup()
			dcx.emitWarning(error('e1').build())
			dcx.emitNote(error('e2').build())
			assert.deepStrictEqual(
				emitter.diagnostics.map((d) => d.level),
				[Level.Warning, Level.Note]
			)
			assert.strictEqual(dcx.errorCount(), 0)
		})

		it('should attach code and span in the coded error form', () => {
			const { dcx, emitter } = setup()
			dcx.error(L1012, 'unterminated string literal', createSpan(1, 2, 9))
			const diagnostic = emitter.diagnostics[0]
			assert.strictEqual(diagnostic?.code?.toString(), 'L1012')
			assert.deepStrictEqual(diagnostic?.spans.primary()?.span, createSpan(1, 2, 9))
		})

		it('should render plain error text literally', () => {
			const { dcx, emitter } = setup()
			dcx.error('file not found: my_file*.cz')
			assert.strictEqual(emitter.diagnostics[0]?.message.renderPlainText(), 'file not found: my_file*.cz')
		})
	})

	describe('stats and output', () => {
		it('should report sorted unique error codes', () => {
			const { dcx } = setup()
			dcx.error(L1021, 'a', createSpan(1, 0, 1))
			dcx.error(L1012, 'b', createSpan(1, 1, 2))
			dcx.error(L1021, 'c', createSpan(1, 2, 3))
			dcx.warning('w')
			const stats = dcx.stats()
			assert.strictEqual(stats.errorCount, 3)
			assert.strictEqual(stats.warningCount, 1)
			assert.deepStrictEqual(stats.uniqueErrorCodes.map(String), ['L1012', 'L1021'])
		})

		it('should forward summary and flush to the emitter', () => {
			const { dcx, emitter } = setup()
			dcx.error('x')
			dcx.emitSummary()
			dcx.flush()
			assert.strictEqual(emitter.summaries[0]?.errorCount, 1)
			assert.strictEqual(emitter.flushes, 1)
		})

		it('should hold the locator it was given', () => {
			const { dcx } = setup()
			assert.strictEqual(dcx.locator, null)
		})
	})
})
