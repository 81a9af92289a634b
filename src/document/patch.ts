import { config } from '../config.js'
import { AmbiguousError, NotFoundError, RejectedEditError, type EditError } from '../errors.js'
import { kernelOf } from './regions.js'
import { validate } from './validate.js'

export interface Edit {
	old: string
	new: string
}

export type PatchResult =
	| { ok: true; source: string; kernelChanged: boolean }
	| { ok: false; source: string; error: EditError }

// Overlapping matches count, so "aa" occurs twice in "aaa". The empty string matches at every position.
export function countOccurrences(haystack: string, needle: string): number {
	if (needle === '') return haystack.length + 1
	let count = 0
	for (let index = haystack.indexOf(needle); index !== -1; index = haystack.indexOf(needle, index + 1)) {
		count++
	}
	return count
}

/**
 * Applies edits in order against the evolving text, so a later edit may target text an earlier one introduced.
 * All-or-nothing: on any failure the original source comes back with the error.
 */
export function applyEdits(source: string, edits: readonly Edit[]): PatchResult {
	if (edits.length === 0) return { ok: true, source, kernelChanged: false }

	const { notFoundPreview, ambiguousPreview } = config.messages
	let patched = source
	for (const edit of edits) {
		const count = countOccurrences(patched, edit.old)
		if (count === 0) return { ok: false, source, error: new NotFoundError(edit.old, notFoundPreview) }
		if (count > 1) return { ok: false, source, error: new AmbiguousError(edit.old, count, ambiguousPreview) }

		// Sliced rather than String.replace so `$&` and friends in the replacement stay literal
		const index = patched.indexOf(edit.old)
		patched = patched.slice(0, index) + edit.new + patched.slice(index + edit.old.length)
	}

	const invalid = validate(patched)
	if (invalid) return { ok: false, source, error: new RejectedEditError(invalid) }

	return { ok: true, source: patched, kernelChanged: kernelOf(source) !== kernelOf(patched) }
}
