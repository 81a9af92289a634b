import { StructureError, type ValidationError } from '../errors.js'
import { compileKernel } from '../kernel/compile.js'
import { countMarkers, kernelOf } from './regions.js'

/** Returns the first structural or syntax problem of a candidate document, or null if it may be persisted. */
export function validate(content: string): ValidationError | null {
	const markers = countMarkers(content)
	if (markers === 0) return new StructureError('missing')
	if (markers > 1) return new StructureError('multiple')

	const compiled = compileKernel(kernelOf(content))
	return compiled.ok ? null : compiled.error
}
