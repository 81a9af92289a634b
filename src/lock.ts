/**
 * Serializes save and reload. Not reentrant: code already inside `run` must call the unlocked variant
 * (ReloadEngine.swap) instead of anything that acquires the lock again.
 */
export class SessionLock {
	private tail: Promise<void> = Promise.resolve()
	private held = false

	get locked(): boolean {
		return this.held
	}

	async run<T>(fn: () => Promise<T>): Promise<T> {
		const previous = this.tail
		let release: () => void = () => {}
		this.tail = new Promise<void>(resolve => { release = resolve })
		await previous
		this.held = true
		try {
			return await fn()
		} finally {
			this.held = false
			release()
		}
	}
}
