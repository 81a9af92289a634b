import { isDatabaseConnected } from './database.js'
import SessionLogModel from './models/SessionLog.js'

type Level = 'debug' | 'info' | 'warn' | 'error'

export interface LogEntry {
	timestamp: string
	level: Level
	message: string
	context?: Record<string, unknown>
}

export type LogSink = (line: string) => void

const LEVEL_ORDER: Record<Level, number> = { debug: 0, info: 1, warn: 2, error: 3 }

function isLevel(value: string | undefined): value is Level {
	return value !== undefined && Object.hasOwn(LEVEL_ORDER, value)
}

const configuredLevel = process.env.LOG_LEVEL
const MIN_LEVEL: Level = isLevel(configuredLevel) ? configuredLevel : 'info'

// Every entry of the session is buffered in memory and flushed to MongoDB at exit
const logBuffer: LogEntry[] = []

const consoleSink: LogSink = line => console.log(line)
let sink: LogSink = consoleSink

// The terminal owns stdout while the editor runs, so it points the logger at a file instead
export function setLogSink(next: LogSink | null): void {
	sink = next ?? consoleSink
}

function log(level: Level, message: string, context?: Record<string, unknown>): void {
	if (LEVEL_ORDER[level] < LEVEL_ORDER[MIN_LEVEL]) return
	const timestamp = new Date().toISOString()
	logBuffer.push({ timestamp, level, message, context })
	const prefix = `${timestamp} [${level.toUpperCase()}]`
	sink(context ? `${prefix} ${message} ${JSON.stringify(context)}` : `${prefix} ${message}`)
}

export async function writeSessionLog(): Promise<void> {
	if (!isDatabaseConnected()) {
		logBuffer.length = 0
		return
	}
	try {
		await SessionLogModel.create({
			entries: logBuffer.map(e => ({
				timestamp: e.timestamp,
				level: e.level,
				message: e.message,
				context: e.context,
			})),
		})
		log('info', 'Session log saved to database')
	} catch (err) {
		log('error', 'Failed to save session log', { error: err instanceof Error ? err.message : String(err) })
	}
	logBuffer.length = 0
}

export function getLogBuffer(): readonly LogEntry[] {
	return logBuffer
}

const logger = {
	debug: (msg: string, ctx?: Record<string, unknown>) => log('debug', msg, ctx),
	info: (msg: string, ctx?: Record<string, unknown>) => log('info', msg, ctx),
	warn: (msg: string, ctx?: Record<string, unknown>) => log('warn', msg, ctx),
	error: (msg: string, ctx?: Record<string, unknown>) => log('error', msg, ctx),
}

export default logger
