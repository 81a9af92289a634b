import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals'

type EnvModule = typeof import('./env.js')

function loadEnv(): EnvModule['env'] {
	let loaded: EnvModule | undefined
	jest.isolateModules(() => {
		loaded = require('./env.js')
	})
	if (!loaded) throw new Error('env module did not load')
	return loaded.env
}

describe('env', () => {
	const original = process.env

	beforeEach(() => {
		process.env = { ...original }
		delete process.env.DUET_DOCUMENT
		delete process.env.DUET_LOG_FILE
		delete process.env.DUET_DB_URI
		process.env.ANTHROPIC_API_KEY = 'test-key'
	})

	afterEach(() => {
		process.env = original
	})

	it('requires an Anthropic API key', () => {
		delete process.env.ANTHROPIC_API_KEY
		expect(() => loadEnv()).toThrow('Missing required environment variable: ANTHROPIC_API_KEY')
	})

	it('falls back to defaults for the document, log file and database', () => {
		const env = loadEnv()
		expect(env.anthropicApiKey).toBe('test-key')
		expect(env.documentPath).toBe('./duet.ts')
		expect(env.logFile).toBe('./duet.log')
		expect(env.dbUri).toBe('')
	})

	it('reads overrides from the environment', () => {
		process.env.DUET_DOCUMENT = '/tmp/notes.ts'
		process.env.DUET_LOG_FILE = '/tmp/notes.log'
		process.env.DUET_DB_URI = 'mongodb://localhost:27017/duet'
		const env = loadEnv()
		expect(env.documentPath).toBe('/tmp/notes.ts')
		expect(env.logFile).toBe('/tmp/notes.log')
		expect(env.dbUri).toBe('mongodb://localhost:27017/duet')
	})

	it('determines production status from NODE_ENV', () => {
		process.env.NODE_ENV = 'production'
		expect(loadEnv().isProduction).toBe(true)
		process.env.NODE_ENV = 'test'
		expect(loadEnv().isProduction).toBe(false)
	})
})
