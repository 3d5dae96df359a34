import assert from 'node:assert'
import { describe, it } from 'node:test'
import { interpolateMessage } from '../src/interpolate.ts'

describe('interpolateMessage', () => {
	it('should return message unchanged without args', () => {
		assert.strictEqual(interpolateMessage('file not found: {path}'), 'file not found: {path}')
	})

	it('should substitute named placeholders', () => {
		assert.strictEqual(
			interpolateMessage('file too large: {path} ({size} bytes, limit {limit})', {
				limit: 16,
				path: 'a.cz',
				size: 20,
			}),
			'file too large: a.cz (20 bytes, limit 16)'
		)
	})

	it('should substitute positional placeholders', () => {
		assert.strictEqual(interpolateMessage('{0} then {1} then {0}', ['a', 2]), 'a then 2 then a')
	})

	it('should keep unknown placeholders', () => {
		assert.strictEqual(interpolateMessage('{known} {unknown}', { known: 'x' }), 'x {unknown}')
		assert.strictEqual(interpolateMessage('{0} {3}', ['only']), 'only {3}')
		assert.strictEqual(interpolateMessage('{name}', ['positional']), '{name}')
	})
})
