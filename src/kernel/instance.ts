import { z } from 'zod'
import type { Behavior, Command, EditorState, Frame, Key, Viewport } from './types.js'
import { isCommand } from './types.js'
import { config } from '../config.js'
import { toLines } from '../document/regions.js'

const frameSchema = z.object({
	lines: z.array(z.string()),
	status: z.string(),
	cursor: z.object({ row: z.number().int(), column: z.number().int() }),
})

export function createState(content: string, status: string): EditorState {
	const lines = toLines(content)
	const cursorY = lines.length - 1
	return {
		lines,
		cursorY,
		cursorX: lines[cursorY].length,
		scrollY: 0,
		status,
		lastError: null,
	}
}

/**
 * The running editor: stored state plus the operation table the kernel region currently defines.
 * Rebinding swaps the table in a single assignment and never touches the state.
 */
export class LiveInstance {
	private operations: Behavior
	private reloads = 0

	constructor(readonly state: EditorState, behavior: Behavior) {
		this.operations = behavior
	}

	get behavior(): Behavior {
		return this.operations
	}

	get generation(): number {
		return this.reloads
	}

	rebind(next: Behavior): void {
		this.operations = next
		this.reloads++
	}

	document(): string {
		return this.state.lines.join(config.document.lineSeparator)
	}

	replaceDocument(content: string): void {
		this.state.lines = toLines(content)
	}

	// Kernel code is untrusted: anything it returns that is not a known command is ignored
	handleKey(key: Key): Command | null {
		const result: unknown = this.operations.handleKey(this.state, key)
		return isCommand(result) ? result : null
	}

	render(viewport: Viewport): Frame {
		const parsed = frameSchema.safeParse(this.operations.render(this.state, viewport))
		if (!parsed.success) {
			const issue = parsed.error.issues[0]
			throw new Error(`render returned an invalid frame: ${issue.path.join('.') || 'frame'} ${issue.message}`)
		}
		return parsed.data
	}
}
