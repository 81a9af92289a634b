import { describe, it, expect, beforeAll } from '@jest/globals'
import { readSeed } from './seed.js'
import { loadKernel } from './compile.js'
import { createState } from './instance.js'
import type { Behavior, Key } from './types.js'
import { countMarkers, kernelOf } from '../document/regions.js'
import { validate } from '../document/validate.js'

const MARKER = '// === CONVERSATION ==='

function key(name: string, options: Partial<Key> = {}): Key {
	return { name, sequence: name.length === 1 ? name : '', ctrl: false, meta: false, shift: false, ...options }
}

describe('seed document', () => {
	let seed: string
	let behavior: Behavior

	beforeAll(async () => {
		seed = await readSeed()
		behavior = loadKernel(kernelOf(seed), { require })
	})

	it('is a valid document with exactly one marker', () => {
		expect(validate(seed)).toBeNull()
		expect(countMarkers(seed)).toBe(1)
	})

	it('maps control keys to commands', () => {
		const state = createState('a', '')
		expect(behavior.handleKey(state, key('s', { ctrl: true }))).toBe('save')
		expect(behavior.handleKey(state, key('r', { ctrl: true }))).toBe('reload')
		expect(behavior.handleKey(state, key('f', { ctrl: true }))).toBe('agent')
		expect(behavior.handleKey(state, key('q', { ctrl: true }))).toBe('quit')
		expect(behavior.handleKey(state, key('x', { ctrl: true }))).toBeNull()
	})

	it('inserts printable characters at the cursor', () => {
		const state = createState('a\nbc', '')
		state.cursorX = 1
		behavior.handleKey(state, key('x'))
		expect(state.lines).toEqual(['a', 'bxc'])
		expect(state.cursorX).toBe(2)
	})

	it('ignores non-printable sequences', () => {
		const state = createState('a', '')
		behavior.handleKey(state, key('escape', { sequence: '\x1b' }))
		expect(state.lines).toEqual(['a'])
	})

	it('joins lines on backspace at the start of a line', () => {
		const state = createState('ab\ncd', '')
		state.cursorX = 0
		behavior.handleKey(state, key('backspace'))
		expect(state.lines).toEqual(['abcd'])
		expect(state.cursorY).toBe(0)
		expect(state.cursorX).toBe(2)
	})

	it('splits a kernel line on enter', () => {
		const state = createState(`ab\n${MARKER}`, '')
		state.cursorY = 0
		state.cursorX = 1
		behavior.handleKey(state, key('return'))
		expect(state.lines).toEqual(['a', 'b', MARKER])
		expect(state.cursorY).toBe(1)
		expect(state.cursorX).toBe(0)
	})

	it('starts a comment line on enter in the conversation', () => {
		const state = createState(`x = 1\n${MARKER}\n// hi`, '')
		behavior.handleKey(state, key('return'))
		expect(state.lines).toEqual(['x = 1', MARKER, '// hi', '// '])
		expect(state.cursorY).toBe(3)
		expect(state.cursorX).toBe(3)
	})

	it('clamps the column when moving to a shorter line', () => {
		const state = createState('a\nlonger', '')
		behavior.handleKey(state, key('up'))
		expect(state.cursorY).toBe(0)
		expect(state.cursorX).toBe(1)
	})

	it('scrolls the view to keep the cursor visible', () => {
		const state = createState(Array.from({ length: 10 }, (_, i) => `l${i + 1}`).join('\n'), 'Saved!')
		state.cursorX = 0
		const frame = behavior.render(state, { rows: 5, columns: 20 })
		expect(state.scrollY).toBe(7)
		expect(frame).toEqual({
			lines: ['l8', 'l9', 'l10'],
			status: ' Saved! | Line 10:1',
			cursor: { row: 2, column: 0 },
		})
	})
})
