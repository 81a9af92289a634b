import { config } from '../config.js'

// The kernel region is the lines strictly before the marker; the log region is the marker and everything after it.
export interface Regions {
	kernelLines: string[]
	logLines: string[]
}

const { marker, commentPrefix, lineSeparator } = config.document

export function toLines(content: string): string[] {
	return content.split(lineSeparator)
}

export function countMarkers(content: string): number {
	return toLines(content).filter(line => line === marker).length
}

function findMarkerLine(lines: readonly string[]): number {
	return lines.indexOf(marker)
}

// Splits at the first marker line. Returns null when the document has no marker.
export function splitRegions(content: string): Regions | null {
	const lines = toLines(content)
	const index = findMarkerLine(lines)
	if (index === -1) return null
	return { kernelLines: lines.slice(0, index), logLines: lines.slice(index) }
}

// Without a marker the whole text counts as kernel
export function kernelOf(content: string): string {
	const regions = splitRegions(content)
	return regions ? regions.kernelLines.join(lineSeparator) : content
}

export function toCommentLines(message: string): string[] {
	return message.split(lineSeparator).map(line => line ? `${commentPrefix} ${line}` : commentPrefix)
}

/** Appends a message to the end of the document, which is always inside the log region. */
export function appendToLog(content: string, message: string): string {
	if (!message) return content
	return [content.trimEnd(), commentPrefix, ...toCommentLines(message)].join(lineSeparator)
}
