import { describe, it, expect, jest } from '@jest/globals'

jest.mock('./logger.js', () => {
	const noop = (): void => {}
	return { __esModule: true, default: { debug: noop, info: noop, warn: noop, error: noop } }
})

import { formatFrame, toKey } from './terminal.js'

describe('formatFrame', () => {
	it('draws clipped lines, the status row in reverse video and the cursor', () => {
		const output = formatFrame(
			{ lines: ['ab', 'cdef', 'never shown'], status: 'st', cursor: { row: 1, column: 9 } },
			{ rows: 3, columns: 4 },
		)
		expect(output).toBe('\x1b[?25l\x1b[2J\x1b[1;1Hab\x1b[2;1Hcde\x1b[3;1H\x1b[7mst\x1b[0m\x1b[2;4H\x1b[?25h')
	})

	it('keeps a negative cursor on screen', () => {
		const output = formatFrame({ lines: [], status: '', cursor: { row: -2, column: -1 } }, { rows: 2, columns: 10 })
		expect(output.endsWith('\x1b[1;1H\x1b[?25h')).toBe(true)
	})
})

describe('toKey', () => {
	it('fills in a bare character', () => {
		expect(toKey('a', undefined)).toEqual({ name: '', sequence: 'a', ctrl: false, meta: false, shift: false })
	})

	it('copies what readline decoded', () => {
		expect(toKey('\x13', { name: 's', ctrl: true, sequence: '\x13' })).toEqual({
			name: 's',
			sequence: '\x13',
			ctrl: true,
			meta: false,
			shift: false,
		})
	})
})
