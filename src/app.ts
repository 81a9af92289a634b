import { createWriteStream } from 'fs'
import { createRequire } from 'module'
import { env } from './env.js'
import { config } from './config.js'
import logger, { setLogSink, writeSessionLog } from './logger.js'
import { connectToDatabase, disconnectFromDatabase } from './database.js'
import { errorMessage } from './errors.js'
import { logSummary } from './usage.js'
import { FileDocumentStore, type DocumentStore } from './document/store.js'
import { kernelOf } from './document/regions.js'
import { validate } from './document/validate.js'
import { loadKernel } from './kernel/compile.js'
import { LiveInstance, createState } from './kernel/instance.js'
import { ReloadEngine } from './kernel/reload.js'
import { readSeed } from './kernel/seed.js'
import type { Behavior } from './kernel/types.js'
import { SessionLock } from './lock.js'
import { PersistenceGateway } from './persistence.js'
import { AgentSession } from './agents/session.js'
import { AnthropicCollaborator } from './agents/collaborator.js'
import { EditorSession } from './editor.js'
import { Terminal } from './terminal.js'

export async function openDocument(store: DocumentStore): Promise<string> {
	const existing = await store.read()
	if (existing !== null) return existing

	const seed = await readSeed()
	const invalid = validate(seed)
	if (invalid) throw new Error(`Seed document is invalid: ${invalid.message}`)
	await store.write(seed)
	logger.info(`Created ${store.location} from the seed document`)
	return seed
}

/**
 * Loads the persisted kernel. If it cannot run, the seed kernel takes over so the document can still be
 * repaired from inside the editor; the returned status says so.
 */
export async function bootKernel(store: DocumentStore, content: string): Promise<{ behavior: Behavior; status: string }> {
	const kernelRequire = createRequire(store.location)
	try {
		return { behavior: loadKernel(kernelOf(content), { require: kernelRequire }), status: '' }
	} catch (error) {
		const message = errorMessage(error)
		logger.error('Persisted kernel failed to load, running the seed kernel', { error: message })
		const behavior = loadKernel(kernelOf(await readSeed()), { require: kernelRequire })
		return { behavior, status: `Kernel failed to load: ${message.slice(0, config.messages.shortFailure)}` }
	}
}

export async function run(): Promise<void> {
	const logStream = createWriteStream(env.logFile, { flags: 'a' })
	setLogSink(line => logStream.write(`${line}\n`))
	logger.info('duet starting...')

	try {
		await connectToDatabase(env.dbUri)

		const store = new FileDocumentStore(env.documentPath)
		const content = await openDocument(store)
		const { behavior, status } = await bootKernel(store, content)

		const lock = new SessionLock()
		const instance = new LiveInstance(createState(content, status), behavior)
		const reloader = new ReloadEngine(store, instance, lock)
		const gateway = new PersistenceGateway(store, reloader, lock)
		const agent = new AgentSession(new AnthropicCollaborator(), gateway, instance.state)
		const session = new EditorSession({ instance, gateway, reloader, agent })

		await new Terminal().run(session)
		logger.info('duet exiting')
	} finally {
		logSummary()
		await writeSessionLog()
		await disconnectFromDatabase()
		setLogSink(null)
		await new Promise<void>(resolve => logStream.end(() => resolve()))
	}
}
