export abstract class DuetError extends Error {
	abstract readonly kind: string

	constructor(message: string) {
		super(message)
		this.name = new.target.name
	}
}

export class StructureError extends DuetError {
	readonly kind = 'structure'

	constructor(readonly problem: 'missing' | 'multiple') {
		super(problem === 'missing' ? 'Structure broken: MARKER missing' : 'Structure broken: multiple MARKERs')
	}
}

export class KernelSyntaxError extends DuetError {
	readonly kind = 'syntax'

	constructor(readonly line: number, readonly detail: string) {
		super(`Syntax error line ${line}: ${detail}`)
	}
}

export class NotFoundError extends DuetError {
	readonly kind = 'not-found'

	constructor(readonly pattern: string, preview: number) {
		super(`Edit not found: '${pattern.slice(0, preview)}...'`)
	}
}

export class AmbiguousError extends DuetError {
	readonly kind = 'ambiguous'

	constructor(readonly pattern: string, readonly count: number, preview: number) {
		super(`Edit ambiguous (${count}x): '${pattern.slice(0, preview)}...'`)
	}
}

/** The batch applied cleanly but the result would not pass validation. */
export class RejectedEditError extends DuetError {
	readonly kind = 'rejected'

	constructor(readonly reason: ValidationError) {
		super(`Edit would cause: ${reason.message}`)
	}
}

export class ReloadError extends DuetError {
	readonly kind = 'reload'
}

export class AgentProtocolError extends DuetError {
	readonly kind = 'agent-protocol'
}

export type ValidationError = StructureError | KernelSyntaxError
export type EditError = NotFoundError | AmbiguousError | RejectedEditError

// Kernel code runs in its own vm realm, so its errors fail `instanceof Error` here
export function errorMessage(error: unknown): string {
	if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
		return error.message
	}
	return String(error)
}
