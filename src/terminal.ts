import { emitKeypressEvents, type Key as ReadlineKey } from 'readline'
import logger from './logger.js'
import { errorMessage } from './errors.js'
import type { EditorSession } from './editor.js'
import type { Frame, Key, Viewport } from './kernel/types.js'

const CSI = '\x1b['
const ENTER_ALTERNATE_SCREEN = `${CSI}?1049h`
const LEAVE_ALTERNATE_SCREEN = `${CSI}?1049l`
const HIDE_CURSOR = `${CSI}?25l`
const SHOW_CURSOR = `${CSI}?25h`
const REVERSE = `${CSI}7m`
const RESET = `${CSI}0m`

function moveTo(row: number, column: number): string {
	return `${CSI}${row + 1};${column + 1}H`
}

/** Frame lines fill every row but the last, which holds the status line in reverse video. */
export function formatFrame(frame: Frame, viewport: Viewport): string {
	const width = Math.max(viewport.columns - 1, 1)
	const out = [HIDE_CURSOR, `${CSI}2J`]
	frame.lines.slice(0, Math.max(viewport.rows - 1, 0)).forEach((line, row) => {
		out.push(moveTo(row, 0), line.slice(0, width))
	})
	out.push(moveTo(viewport.rows - 1, 0), REVERSE, frame.status.slice(0, width), RESET)
	const row = Math.min(Math.max(frame.cursor.row, 0), viewport.rows - 1)
	const column = Math.min(Math.max(frame.cursor.column, 0), width)
	out.push(moveTo(row, column), SHOW_CURSOR)
	return out.join('')
}

export function toKey(sequence: string | undefined, key: ReadlineKey | undefined): Key {
	return {
		name: key?.name ?? '',
		sequence: key?.sequence ?? sequence ?? '',
		ctrl: key?.ctrl ?? false,
		meta: key?.meta ?? false,
		shift: key?.shift ?? false,
	}
}

/** Thin front end: raw keypresses in, painted frames out. */
export class Terminal {
	constructor(
		private readonly input: NodeJS.ReadStream = process.stdin,
		private readonly output: NodeJS.WriteStream = process.stdout,
	) {}

	viewport(): Viewport {
		return { rows: this.output.rows || 24, columns: this.output.columns || 80 }
	}

	run(session: EditorSession): Promise<void> {
		if (!this.input.isTTY) return Promise.reject(new Error('duet needs an interactive terminal'))

		return new Promise<void>((resolve, reject) => {
			const paint = (): void => {
				const viewport = this.viewport()
				this.output.write(formatFrame(session.frame(viewport), viewport))
			}

			const finish = (error?: unknown): void => {
				this.input.off('keypress', onKeypress)
				this.output.off('resize', paint)
				session.onChange = () => {}
				this.input.setRawMode(false)
				this.input.pause()
				this.output.write(LEAVE_ALTERNATE_SCREEN)
				if (error === undefined) resolve()
				else reject(error)
			}

			const onKeypress = (sequence: string | undefined, key: ReadlineKey | undefined): void => {
				session.handleKey(toKey(sequence, key)).then(
					keepGoing => {
						if (keepGoing) paint()
						else finish()
					},
					(error: unknown) => {
						logger.error('Key handling failed', { error: errorMessage(error) })
						finish(error)
					},
				)
			}

			emitKeypressEvents(this.input)
			this.input.setRawMode(true)
			this.input.resume()
			this.output.write(ENTER_ALTERNATE_SCREEN)
			this.input.on('keypress', onKeypress)
			this.output.on('resize', paint)
			session.onChange = paint
			paint()
		})
	}
}
