import type { Behavior, Command, EditorState, Frame, Key, Viewport } from '../src/kernel/types.js'

const MARKER = '// === CONVERSATION ==='
const COMMENT = '// '
const HELP = 'Ctrl+F: agent | Ctrl+R: reload | Ctrl+S: save | Ctrl+Q: quit'

const CONTROL_COMMANDS: Record<string, Command> = {
	s: 'save',
	r: 'reload',
	f: 'agent',
	q: 'quit',
}

function inConversation(state: EditorState): boolean {
	const marker = state.lines.indexOf(MARKER)
	return marker >= 0 && state.cursorY > marker
}

function clampColumn(state: EditorState): void {
	state.cursorX = Math.min(state.cursorX, state.lines[state.cursorY].length)
}

function backspace(state: EditorState): void {
	const line = state.lines[state.cursorY]
	if (state.cursorX > 0) {
		state.lines[state.cursorY] = line.slice(0, state.cursorX - 1) + line.slice(state.cursorX)
		state.cursorX--
	} else if (state.cursorY > 0) {
		state.cursorX = state.lines[state.cursorY - 1].length
		state.lines[state.cursorY - 1] += line
		state.lines.splice(state.cursorY, 1)
		state.cursorY--
	}
}

function deleteForward(state: EditorState): void {
	const line = state.lines[state.cursorY]
	if (state.cursorX < line.length) {
		state.lines[state.cursorY] = line.slice(0, state.cursorX) + line.slice(state.cursorX + 1)
	} else if (state.cursorY < state.lines.length - 1) {
		state.lines[state.cursorY] += state.lines[state.cursorY + 1]
		state.lines.splice(state.cursorY + 1, 1)
	}
}

// Lines typed below the marker stay comments
function newline(state: EditorState): void {
	const line = state.lines[state.cursorY]
	let remainder = line.slice(state.cursorX)
	state.lines[state.cursorY] = line.slice(0, state.cursorX)
	if (inConversation(state)) {
		if (!remainder) remainder = COMMENT
		else if (!remainder.startsWith('//')) remainder = COMMENT + remainder.trimStart()
	}
	state.lines.splice(state.cursorY + 1, 0, remainder)
	state.cursorY++
	state.cursorX = inConversation(state) ? COMMENT.length : 0
}

function insert(state: EditorState, text: string): void {
	const line = state.lines[state.cursorY]
	state.lines[state.cursorY] = line.slice(0, state.cursorX) + text + line.slice(state.cursorX)
	state.cursorX += text.length
}

function isPrintable(key: Key): boolean {
	if (key.ctrl || key.meta || key.sequence.length !== 1) return false
	const code = key.sequence.charCodeAt(0)
	return code >= 32 && code <= 126
}

export const behavior: Behavior = {
	handleKey(state: EditorState, key: Key): Command | null {
		if (key.ctrl) return CONTROL_COMMANDS[key.name] ?? null

		switch (key.name) {
			case 'up':
				if (state.cursorY > 0) {
					state.cursorY--
					clampColumn(state)
				}
				return null
			case 'down':
				if (state.cursorY < state.lines.length - 1) {
					state.cursorY++
					clampColumn(state)
				}
				return null
			case 'left':
				if (state.cursorX > 0) state.cursorX--
				return null
			case 'right':
				if (state.cursorX < state.lines[state.cursorY].length) state.cursorX++
				return null
			case 'backspace':
				backspace(state)
				return null
			case 'delete':
				deleteForward(state)
				return null
			case 'return':
			case 'enter':
				newline(state)
				return null
		}

		if (isPrintable(key)) insert(state, key.sequence)
		return null
	},

	render(state: EditorState, viewport: Viewport): Frame {
		const height = Math.max(viewport.rows - 2, 1)
		const width = Math.max(viewport.columns - 1, 1)
		if (state.cursorY < state.scrollY) state.scrollY = state.cursorY
		if (state.cursorY >= state.scrollY + height) state.scrollY = state.cursorY - height + 1

		const status = ` ${state.status || HELP} | Line ${state.cursorY + 1}:${state.cursorX + 1} `
		return {
			lines: state.lines.slice(state.scrollY, state.scrollY + height).map(line => line.slice(0, width)),
			status: status.slice(0, width).padEnd(width),
			cursor: { row: state.cursorY - state.scrollY, column: Math.min(state.cursorX, width) },
		}
	},
}

// === CONVERSATION ===
// Everything above the marker is this editor's behavior. Everything below is our conversation.
// Type here, then press Ctrl+F to ask the agent. It can answer, and it can rewrite the code above.
// Ctrl+S saves; if the code above changed, the editor reloads it without restarting.
//
