import logger from '../logger.js'
import { errorMessage, type EditError } from '../errors.js'
import { applyEdits } from '../document/patch.js'
import { appendToLog } from '../document/regions.js'
import type { EditorState } from '../kernel/types.js'
import type { ReloadResult } from '../kernel/reload.js'
import type { PersistenceGateway, SaveResult } from '../persistence.js'
import type { AgentPort, AgentResponse } from './port.js'

export type AgentPhase =
	| 'idle'
	| 'requesting'
	| 'requestFailed'
	| 'responseReceived'
	| 'patching'
	| 'patchFailed'
	| 'patchSucceeded'
	| 'saving'
	| 'saveFailed'
	| 'saveSucceeded'
	| 'maybeReloading'

const TRANSITIONS: Record<AgentPhase, readonly AgentPhase[]> = {
	idle: ['requesting'],
	requesting: ['responseReceived', 'requestFailed'],
	requestFailed: ['idle'],
	responseReceived: ['patching'],
	patching: ['patchFailed', 'patchSucceeded'],
	patchFailed: ['idle'],
	patchSucceeded: ['saving'],
	saving: ['saveFailed', 'saveSucceeded'],
	saveFailed: ['idle'],
	saveSucceeded: ['maybeReloading'],
	maybeReloading: ['idle'],
}

export type AgentOutcome =
	| { kind: 'busy' }
	| { kind: 'requestFailed'; error: string }
	| { kind: 'patchFailed'; error: EditError }
	| { kind: 'saveFailed'; error: string; document: string }
	| { kind: 'saved'; document: string; kernelChanged: boolean; reload: ReloadResult | null }

export type PhaseListener = (phase: AgentPhase) => void

/**
 * One agent interaction at a time: request, patch, save, maybe reload, back to idle.
 * `lastError` lives on the editor state so it survives kernel reloads and is sent with the next request.
 */
export class AgentSession {
	private current: AgentPhase = 'idle'

	constructor(
		private readonly port: AgentPort,
		private readonly gateway: Pick<PersistenceGateway, 'save'>,
		private readonly context: Pick<EditorState, 'lastError'>,
		private readonly onPhase: PhaseListener = () => {},
	) {}

	get phase(): AgentPhase {
		return this.current
	}

	get lastError(): string | null {
		return this.context.lastError
	}

	async run(document: string): Promise<AgentOutcome> {
		if (this.current !== 'idle') return { kind: 'busy' }
		try {
			return await this.cycle(document)
		} catch (error) {
			// Unexpected failures must not leave the machine stuck outside idle
			this.current = 'idle'
			throw error
		}
	}

	private transition(next: AgentPhase): void {
		if (!TRANSITIONS[this.current].includes(next)) {
			throw new Error(`Invalid agent transition: ${this.current} -> ${next}`)
		}
		this.current = next
		logger.debug(`Agent phase: ${next}`)
		this.onPhase(next)
	}

	private async cycle(document: string): Promise<AgentOutcome> {
		this.transition('requesting')
		let response: AgentResponse
		try {
			response = await this.port.propose({ document, lastError: this.context.lastError ?? undefined })
		} catch (error) {
			const message = errorMessage(error)
			logger.error('Collaborator request failed', { error: message })
			this.transition('requestFailed')
			this.transition('idle')
			return { kind: 'requestFailed', error: message }
		}
		this.transition('responseReceived')

		this.transition('patching')
		const patch = applyEdits(document, response.edits)
		if (!patch.ok) {
			logger.warn('Collaborator edits rejected', { error: patch.error.message })
			this.context.lastError = patch.error.message
			this.transition('patchFailed')
			this.transition('idle')
			return { kind: 'patchFailed', error: patch.error }
		}
		this.context.lastError = null
		this.transition('patchSucceeded')

		const next = appendToLog(patch.source, response.message)
		this.transition('saving')
		const saved = await this.gateway.save(next, {
			onCommit: () => {
				this.transition('saveSucceeded')
				this.transition('maybeReloading')
			},
		}).then(
			(result): SaveResult | string => result,
			(error: unknown) => errorMessage(error),
		)

		if (typeof saved === 'string' || !saved.ok) {
			const message = typeof saved === 'string' ? saved : saved.error.message
			this.context.lastError = message
			this.transition('saveFailed')
			this.transition('idle')
			return { kind: 'saveFailed', error: message, document: next }
		}

		this.transition('idle')
		return { kind: 'saved', document: next, kernelChanged: saved.kernelChanged, reload: saved.reload }
	}
}
