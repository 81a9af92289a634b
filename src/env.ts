const nodeEnv = process.env.NODE_ENV ?? 'production'

function requireEnv(key: string): string {
	const value = process.env[key]
	if (!value) throw new Error(`Missing required environment variable: ${key}`)
	return value
}

export const env = {
	nodeEnv,
	isProduction: nodeEnv === 'production',
	anthropicApiKey: requireEnv('ANTHROPIC_API_KEY'),
	documentPath: process.env.DUET_DOCUMENT ?? './duet.ts',
	logFile: process.env.DUET_LOG_FILE ?? './duet.log',
	// Optional: without it, exchanges and session logs are not persisted
	dbUri: process.env.DUET_DB_URI ?? '',
} as const
