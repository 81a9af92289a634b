import { readFile, rename, writeFile, mkdir } from 'fs/promises'
import { dirname, resolve } from 'path'
import logger from '../logger.js'

export interface DocumentStore {
	readonly location: string
	/** Returns null when nothing has been persisted yet. */
	read(): Promise<string | null>
	write(content: string): Promise<void>
}

function isMissingFile(error: unknown): boolean {
	return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT'
}

export class FileDocumentStore implements DocumentStore {
	readonly location: string

	constructor(path: string) {
		this.location = resolve(path)
	}

	async read(): Promise<string | null> {
		try {
			return await readFile(this.location, 'utf-8')
		} catch (error) {
			if (isMissingFile(error)) return null
			throw error
		}
	}

	// Written beside the target and renamed over it: a crash mid-write leaves the previous document in place
	async write(content: string): Promise<void> {
		await mkdir(dirname(this.location), { recursive: true })
		const temporary = `${this.location}.${process.pid}.tmp`
		await writeFile(temporary, content, 'utf-8')
		await rename(temporary, this.location)
		logger.debug(`Wrote ${content.length} chars to ${this.location}`)
	}
}
