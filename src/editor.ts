import { config } from './config.js'
import logger from './logger.js'
import { errorMessage } from './errors.js'
import type { AgentOutcome, AgentSession } from './agents/session.js'
import type { LiveInstance } from './kernel/instance.js'
import type { ReloadEngine, ReloadResult } from './kernel/reload.js'
import type { Command, EditorState, Frame, Key, Viewport } from './kernel/types.js'
import type { PersistenceGateway } from './persistence.js'

export interface EditorSessionOptions {
	instance: LiveInstance
	gateway: PersistenceGateway
	reloader: ReloadEngine
	agent: AgentSession
}

const { status: statusWidth, editFailure, shortFailure } = config.messages

function reloadStatus(result: ReloadResult): string {
	return result.ok ? 'Reloaded!' : `Reload failed: ${result.error.message.slice(0, shortFailure)}`
}

/** Painted by the host when the kernel's own render throws, so the editor stays usable. */
export function fallbackFrame(state: EditorState, viewport: Viewport): Frame {
	const height = Math.max(viewport.rows - 2, 1)
	const width = Math.max(viewport.columns - 1, 1)
	const top = Math.min(state.scrollY, Math.max(state.lines.length - 1, 0))
	const status = ` ${state.status} | Line ${state.cursorY + 1}:${state.cursorX + 1} `
	const row = state.cursorY - top
	return {
		lines: state.lines.slice(top, top + height).map(line => line.slice(0, width)),
		status: status.slice(0, width).padEnd(width),
		cursor: { row: row >= 0 && row < height ? row : 0, column: Math.min(state.cursorX, width) },
	}
}

/**
 * The driving loop between the terminal and the core: feeds keys to the kernel and carries out the
 * commands it returns. Save, reload and agent cycles are exclusive; keys arriving meanwhile are dropped.
 */
export class EditorSession {
	/** Called when the screen should be repainted before a long operation finishes. */
	onChange: () => void = () => {}
	private pending = false

	constructor(private readonly options: EditorSessionOptions) {}

	get state(): EditorState {
		return this.options.instance.state
	}

	get busy(): boolean {
		return this.pending
	}

	frame(viewport: Viewport): Frame {
		try {
			return this.options.instance.render(viewport)
		} catch (error) {
			this.kernelFault('render', error)
			return fallbackFrame(this.state, viewport)
		}
	}

	/** Resolves to false when the session should end. */
	async handleKey(key: Key): Promise<boolean> {
		// Host-reserved, so a broken kernel can always be left
		if (key.ctrl && key.name === 'c') return false
		if (this.pending) return true

		let command: Command | null
		try {
			command = this.options.instance.handleKey(key)
		} catch (error) {
			this.kernelFault('handleKey', error)
			return true
		}

		switch (command) {
			case 'quit':
				return false
			case 'save':
				await this.exclusive(() => this.save())
				break
			case 'reload':
				await this.exclusive(() => this.reload())
				break
			case 'agent':
				await this.exclusive(() => this.invokeAgent())
				break
		}
		return true
	}

	async save(): Promise<void> {
		try {
			const result = await this.options.gateway.save(this.options.instance.document())
			if (!result.ok) {
				this.state.status = result.error.message.slice(0, statusWidth)
			} else {
				this.state.status = result.reload ? reloadStatus(result.reload) : 'Saved!'
			}
		} catch (error) {
			logger.error('Save failed', { error: errorMessage(error) })
			this.state.status = `Save failed: ${errorMessage(error).slice(0, shortFailure)}`
		}
	}

	async reload(): Promise<void> {
		this.state.status = reloadStatus(await this.options.reloader.reload())
	}

	async invokeAgent(): Promise<void> {
		const { instance, agent } = this.options
		this.state.status = 'Thinking...'
		this.onChange()

		let outcome: AgentOutcome
		try {
			outcome = await agent.run(instance.document())
		} catch (error) {
			logger.error('Agent cycle aborted', { error: errorMessage(error) })
			this.state.status = `Error: ${errorMessage(error).slice(0, shortFailure)}`
			return
		}
		switch (outcome.kind) {
			case 'busy':
				this.state.status = 'Agent busy...'
				return
			case 'requestFailed':
				this.state.status = `Error: ${outcome.error.slice(0, shortFailure)}`
				return
			case 'patchFailed':
				this.state.status = `Edit failed: ${outcome.error.message.slice(0, editFailure)}`
				return
			case 'saveFailed':
				instance.replaceDocument(outcome.document)
				this.state.status = outcome.error.slice(0, statusWidth)
				break
			case 'saved':
				instance.replaceDocument(outcome.document)
				this.state.status = outcome.reload && !outcome.reload.ok ? reloadStatus(outcome.reload) : 'Agent responded!'
				break
		}
		this.state.cursorY = this.state.lines.length - 1
		this.state.cursorX = 0
	}

	private async exclusive(fn: () => Promise<void>): Promise<void> {
		this.pending = true
		try {
			await fn()
		} finally {
			this.pending = false
		}
	}

	private kernelFault(operation: string, error: unknown): void {
		const message = errorMessage(error)
		logger.error(`Kernel ${operation} threw`, { error: message })
		this.state.status = `Kernel error: ${message}`.slice(0, statusWidth)
	}
}
