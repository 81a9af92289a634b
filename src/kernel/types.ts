// Contract between the host and the kernel region of the document.
// The kernel imports these with `import type`, which transpiling erases.

export interface EditorState {
	lines: string[]
	cursorY: number
	cursorX: number
	scrollY: number
	status: string
	lastError: string | null
}

export interface Key {
	name: string
	sequence: string
	ctrl: boolean
	meta: boolean
	shift: boolean
}

export type Command = 'save' | 'reload' | 'agent' | 'quit'

export interface Viewport {
	rows: number
	columns: number
}

export interface Frame {
	lines: string[]
	status: string
	cursor: { row: number; column: number }
}

/** The operation table a kernel exports as `behavior`. */
export interface Behavior {
	handleKey(state: EditorState, key: Key): Command | null | void
	render(state: EditorState, viewport: Viewport): Frame
}

export const COMMANDS: readonly Command[] = ['save', 'reload', 'agent', 'quit']

export function isCommand(value: unknown): value is Command {
	return typeof value === 'string' && COMMANDS.some(command => command === value)
}
