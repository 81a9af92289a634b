import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals'
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'

jest.mock('./logger.js', () => {
	const noop = (): void => {}
	return { __esModule: true, default: { debug: noop, info: noop, warn: noop, error: noop } }
})

import { EditorSession, fallbackFrame } from './editor.js'
import { AgentSession } from './agents/session.js'
import type { AgentPort, AgentResponse } from './agents/port.js'
import { FileDocumentStore } from './document/store.js'
import { loadKernel } from './kernel/compile.js'
import { LiveInstance, createState } from './kernel/instance.js'
import { ReloadEngine } from './kernel/reload.js'
import type { Key } from './kernel/types.js'
import { SessionLock } from './lock.js'
import { PersistenceGateway } from './persistence.js'

const MARKER = '// === CONVERSATION ==='

const KERNEL = `const COMMANDS = { s: 'save', r: 'reload', f: 'agent', q: 'quit' }
export const behavior = {
	handleKey(state, key) {
		if (key.ctrl) return COMMANDS[key.name] ?? null
		if (key.name === 'boom') throw new Error('kernel bug')
		state.lines[state.cursorY] += key.sequence
		return null
	},
	render(state) {
		if (state.lines[0] === 'crash') throw new Error('render bug')
		return { lines: state.lines.slice(), status: state.status, cursor: { row: 0, column: 0 } }
	},
}`

const DOC = `${KERNEL}\n${MARKER}\n// hi`

function key(name: string, ctrl = false): Key {
	return { name, sequence: ctrl ? '' : name, ctrl, meta: false, shift: false }
}

class ScriptedPort implements AgentPort {
	answer: (response: AgentResponse) => void = () => {}
	constructor(private readonly reply: AgentResponse | Error | 'wait') {}
	async propose(): Promise<AgentResponse> {
		const reply = this.reply
		if (reply === 'wait') return new Promise<AgentResponse>(resolve => { this.answer = resolve })
		if (reply instanceof Error) throw reply
		return reply
	}
}

describe('fallbackFrame', () => {
	it('shows the visible lines and a clipped status line', () => {
		const state = { lines: ['a', 'b', 'c'], cursorY: 2, cursorX: 1, scrollY: 0, status: 'x', lastError: null }
		expect(fallbackFrame(state, { rows: 4, columns: 10 })).toEqual({
			lines: ['a', 'b'],
			status: ' x | Line',
			cursor: { row: 0, column: 1 },
		})
	})
})

describe('EditorSession', () => {
	let dir: string
	let path: string
	let instance: LiveInstance

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), 'duet-editor-'))
		path = join(dir, 'duet.ts')
		await writeFile(path, DOC, 'utf-8')
		instance = new LiveInstance(createState(DOC, ''), loadKernel(KERNEL, { require }))
	})

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true })
	})

	function editor(port: AgentPort = new ScriptedPort({ edits: [], message: '' })): EditorSession {
		const store = new FileDocumentStore(path)
		const lock = new SessionLock()
		const reloader = new ReloadEngine(store, instance, lock)
		const gateway = new PersistenceGateway(store, reloader, lock)
		const agent = new AgentSession(port, gateway, instance.state)
		return new EditorSession({ instance, gateway, reloader, agent })
	}

	it('feeds ordinary keys to the kernel', async () => {
		const session = editor()
		await expect(session.handleKey(key('a'))).resolves.toBe(true)
		expect(instance.state.lines[instance.state.lines.length - 1]).toBe('// hia')
	})

	it('ends on Ctrl+C without consulting the kernel', async () => {
		const session = editor()
		await expect(session.handleKey(key('c', true))).resolves.toBe(false)
		expect(instance.document()).toBe(DOC)
	})

	it('ends when the kernel returns quit', async () => {
		await expect(editor().handleKey(key('q', true))).resolves.toBe(false)
	})

	it('saves a log-only change', async () => {
		const session = editor()
		await session.handleKey(key('!'))
		await session.handleKey(key('s', true))
		expect(instance.state.status).toBe('Saved!')
		expect(await readFile(path, 'utf-8')).toBe(`${DOC}!`)
	})

	it('reloads after saving a kernel change', async () => {
		const session = editor()
		instance.replaceDocument(`// v2\n${DOC}`)
		await session.handleKey(key('s', true))
		expect(instance.state.status).toBe('Reloaded!')
		expect(instance.generation).toBe(1)
	})

	it('shows a rejected save and leaves the file alone', async () => {
		const session = editor()
		instance.replaceDocument(KERNEL)
		await session.handleKey(key('s', true))
		expect(instance.state.status).toBe('Structure broken: MARKER missing')
		expect(await readFile(path, 'utf-8')).toBe(DOC)
	})

	it('reports a failed reload and keeps running the previous kernel', async () => {
		const session = editor()
		await writeFile(path, `throw new Error('x')\n${MARKER}\n`, 'utf-8')
		await session.handleKey(key('r', true))
		expect(instance.state.status).toBe('Reload failed: Kernel threw while executing: x')
		await session.handleKey(key('a'))
		expect(instance.state.lines[instance.state.lines.length - 1]).toBe('// hia')
	})

	it('applies an agent reply, saves it and moves the cursor to the end', async () => {
		const session = editor(new ScriptedPort({ edits: [], message: 'Hello' }))
		const painted: string[] = []
		session.onChange = () => painted.push(instance.state.status)

		await session.handleKey(key('f', true))

		const expected = `${DOC}\n//\n// Hello`
		expect(painted).toEqual(['Thinking...'])
		expect(instance.state.status).toBe('Agent responded!')
		expect(instance.document()).toBe(expected)
		expect(await readFile(path, 'utf-8')).toBe(expected)
		expect(instance.state.cursorY).toBe(instance.state.lines.length - 1)
		expect(instance.state.cursorX).toBe(0)
	})

	it('shows a failed patch and keeps the document', async () => {
		const session = editor(new ScriptedPort({ edits: [{ old: 'zzz', new: 'y' }], message: 'x' }))
		await session.handleKey(key('f', true))
		expect(instance.state.status).toBe("Edit failed: Edit not found: 'zzz...'")
		expect(instance.state.lastError).toBe("Edit not found: 'zzz...'")
		expect(instance.document()).toBe(DOC)
	})

	it('shows a failed request', async () => {
		await editor(new ScriptedPort(new Error('network down'))).handleKey(key('f', true))
		expect(instance.state.status).toBe('Error: network down')
	})

	it('drops keys while an agent cycle is pending', async () => {
		const port = new ScriptedPort('wait')
		const session = editor(port)
		const pending = session.handleKey(key('f', true))
		expect(session.busy).toBe(true)

		await expect(session.handleKey(key('a'))).resolves.toBe(true)
		expect(instance.state.lines[instance.state.lines.length - 1]).toBe('// hi')

		port.answer({ edits: [], message: '' })
		await expect(pending).resolves.toBe(true)
		expect(session.busy).toBe(false)
	})

	it('survives a kernel that throws on a key', async () => {
		const session = editor()
		await expect(session.handleKey(key('boom'))).resolves.toBe(true)
		expect(instance.state.status).toBe('Kernel error: kernel bug')
	})

	it('paints a host frame when the kernel render throws', () => {
		const session = editor()
		instance.replaceDocument(`crash\n${MARKER}`)
		const frame = session.frame({ rows: 10, columns: 40 })
		expect(instance.state.status).toBe('Kernel error: render bug')
		expect(frame.lines).toEqual(['crash', MARKER])
	})
})
