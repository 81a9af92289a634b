import ts from 'typescript'
import { createContext, Script } from 'vm'
import { config } from '../config.js'
import { KernelSyntaxError, ReloadError, errorMessage } from '../errors.js'
import type { Behavior } from './types.js'

const COMPILER_OPTIONS: ts.CompilerOptions = {
	module: ts.ModuleKind.CommonJS,
	target: ts.ScriptTarget.ES2022,
	strict: true,
}

export type CompileResult =
	| { ok: true; code: string; script: Script }
	| { ok: false; error: KernelSyntaxError }

const normalize = (line: string): string => line.replace(/[\s;]/g, '')

// V8 reports lines of the transpiled output; find the kernel line that produced it
function kernelLine(kernel: string, code: string, outputLine: number): number {
	const lines = kernel.split('\n')
	const text = normalize(code.split('\n')[outputLine - 1] ?? '')
	const index = text ? lines.findIndex(line => normalize(line) === text) : -1
	if (index !== -1) return index + 1
	return Math.max(Math.min(outputLine, lines.length), 1)
}

function stackLine(error: unknown, fileName: string): number | null {
	if (typeof error !== 'object' || error === null || !('stack' in error) || typeof error.stack !== 'string') return null
	// Node prefixes compile errors with "<filename>:<line>"
	const location = error.stack.split('\n').find(line => line.startsWith(`${fileName}:`))
	const match = location ? /:(\d+)$/.exec(location) : null
	return match ? Number(match[1]) : null
}

// Without a location in the stack: the shortest prefix of the output failing with the same message
function prefixLine(code: string, fileName: string, message: string): number {
	const lines = code.split('\n')
	for (let end = 1; end <= lines.length; end++) {
		try {
			new Script(lines.slice(0, end).join('\n'), { filename: fileName })
		} catch (error) {
			if (errorMessage(error) === message) return end
		}
	}
	return 1
}

function compileError(kernel: string, code: string, fileName: string, error: unknown): KernelSyntaxError {
	const message = errorMessage(error)
	const outputLine = stackLine(error, fileName) ?? prefixLine(code, fileName, message)
	return new KernelSyntaxError(kernelLine(kernel, code, outputLine), message)
}

/**
 * Transpiles the kernel and compiles the output as a script without running it. The TypeScript parser
 * catches syntax errors; V8 catches what it rejects at compile time (redeclared bindings, top-level return).
 * Type errors are never reported.
 */
export function compileKernel(kernel: string, fileName: string = config.document.kernelFileName): CompileResult {
	const output = ts.transpileModule(kernel, { fileName, reportDiagnostics: true, compilerOptions: COMPILER_OPTIONS })
	const diagnostic = output.diagnostics?.find(d => d.category === ts.DiagnosticCategory.Error)
	if (diagnostic) {
		const line = diagnostic.file && diagnostic.start !== undefined
			? diagnostic.file.getLineAndCharacterOfPosition(diagnostic.start).line + 1
			: 1
		return { ok: false, error: new KernelSyntaxError(line, ts.flattenDiagnosticMessageText(diagnostic.messageText, '\n')) }
	}

	try {
		return { ok: true, code: output.outputText, script: new Script(output.outputText, { filename: fileName }) }
	} catch (error) {
		return { ok: false, error: compileError(kernel, output.outputText, fileName, error) }
	}
}

export interface LoadOptions {
	/** Resolves the kernel's own `require` calls. */
	require: NodeJS.Require
	fileName?: string
}

function isBehavior(value: unknown): value is Behavior {
	if (typeof value !== 'object' || value === null) return false
	return config.reload.operations.every(name => typeof Reflect.get(value, name) === 'function')
}

/**
 * Transpiles the kernel region and executes it in a fresh vm context, returning its exported operation table.
 * Throws ReloadError for syntax errors, errors thrown while executing, and missing operations.
 */
export function loadKernel(kernel: string, options: LoadOptions): Behavior {
	const fileName = options.fileName ?? config.document.kernelFileName
	const compiled = compileKernel(kernel, fileName)
	if (!compiled.ok) throw new ReloadError(compiled.error.message)

	const kernelModule: { exports: unknown } = { exports: {} }
	const context = createContext({
		module: kernelModule,
		exports: kernelModule.exports,
		require: options.require,
		console,
	})

	try {
		compiled.script.runInContext(context, { timeout: config.reload.executeTimeout })
	} catch (error) {
		throw new ReloadError(`Kernel threw while executing: ${errorMessage(error)}`)
	}

	const { exportName, operations } = config.reload
	const exported = kernelModule.exports
	if (typeof exported !== 'object' || exported === null || !(exportName in exported)) {
		throw new ReloadError(`Kernel does not export "${exportName}"`)
	}

	const behavior: unknown = Reflect.get(exported, exportName)
	if (!isBehavior(behavior)) {
		const missing = operations.filter(name => typeof behavior !== 'object' || behavior === null || typeof Reflect.get(behavior, name) !== 'function')
		throw new ReloadError(`Kernel behavior is missing operations: ${missing.join(', ')}`)
	}
	return behavior
}
