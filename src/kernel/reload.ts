import { createRequire } from 'module'
import { basename } from 'path'
import logger from '../logger.js'
import { ReloadError, errorMessage } from '../errors.js'
import type { DocumentStore } from '../document/store.js'
import { kernelOf } from '../document/regions.js'
import type { SessionLock } from '../lock.js'
import type { LiveInstance } from './instance.js'
import { loadKernel } from './compile.js'

export type ReloadResult =
	| { ok: true }
	| { ok: false; error: ReloadError }

export class ReloadEngine {
	private readonly kernelRequire: NodeJS.Require

	constructor(
		private readonly store: DocumentStore,
		private readonly instance: LiveInstance,
		private readonly lock: SessionLock,
	) {
		this.kernelRequire = createRequire(store.location)
	}

	reload(): Promise<ReloadResult> {
		return this.lock.run(() => this.swap())
	}

	/**
	 * Rebuilds the operation table from the persisted kernel region and rebinds the live instance.
	 * Caller must hold the session lock. Never throws: on failure the previous behavior stays active.
	 */
	async swap(): Promise<ReloadResult> {
		try {
			const content = await this.store.read()
			if (content === null) throw new ReloadError(`Document not found: ${this.store.location}`)

			const behavior = loadKernel(kernelOf(content), {
				require: this.kernelRequire,
				fileName: basename(this.store.location),
			})
			this.instance.rebind(behavior)
			logger.info(`Kernel reloaded (generation ${this.instance.generation})`)
			return { ok: true }
		} catch (err) {
			const error = err instanceof ReloadError ? err : new ReloadError(errorMessage(err))
			logger.error('Kernel reload failed, previous behavior stays active', { error: error.message })
			return { ok: false, error }
		}
	}
}
