import logger from './logger.js'
import type { ValidationError } from './errors.js'
import type { DocumentStore } from './document/store.js'
import { kernelOf } from './document/regions.js'
import { validate } from './document/validate.js'
import type { ReloadEngine, ReloadResult } from './kernel/reload.js'
import type { SessionLock } from './lock.js'

export type SaveResult =
	| { ok: true; kernelChanged: boolean; reload: ReloadResult | null }
	| { ok: false; error: ValidationError }

export interface SaveOptions {
	/** Called once the content is durable, before any reload starts. */
	onCommit?: (kernelChanged: boolean) => void
}

export class PersistenceGateway {
	constructor(
		private readonly store: DocumentStore,
		private readonly reloader: ReloadEngine,
		private readonly lock: SessionLock,
	) {}

	// The commit stands even when the reload after it fails
	save(content: string, options: SaveOptions = {}): Promise<SaveResult> {
		return this.lock.run(async (): Promise<SaveResult> => {
			const error = validate(content)
			if (error) {
				logger.warn('Save rejected', { error: error.message })
				return { ok: false, error }
			}

			// Compared against what is on disk, not the in-memory session, which may have diverged
			const previous = await this.store.read()
			const kernelChanged = kernelOf(previous ?? '') !== kernelOf(content)

			await this.store.write(content)
			logger.info(`Saved ${this.store.location}${kernelChanged ? ' (kernel changed)' : ''}`)
			options.onCommit?.(kernelChanged)

			const reload = kernelChanged ? await this.reloader.swap() : null
			return { ok: true, kernelChanged, reload }
		})
	}
}
