import mongoose from 'mongoose'

import { config } from './config.js'
import logger from './logger.js'

export function isDatabaseConnected(): boolean {
	return mongoose.connection.readyState === mongoose.ConnectionStates.connected
}

// The audit trail is optional: without a URI the editor runs with nothing persisted but the document
export async function connectToDatabase(uri: string): Promise<boolean> {
	if (!uri) {
		logger.info('No database configured, exchange auditing disabled')
		return false
	}

	const { maxRetryAttempts, retryInterval } = config.db
	for (let attempt = 0; attempt < maxRetryAttempts; attempt++) {
		logger.info(`Attempting connection to MongoDB (attempt ${attempt + 1}/${maxRetryAttempts})`)
		try {
			await mongoose.connect(uri)
			logger.info('Connected to MongoDB')
			return true
		} catch (error) {
			logger.error('Error connecting to MongoDB', { error: error instanceof Error ? error.message : String(error) })
			await new Promise(resolve => setTimeout(resolve, retryInterval))
		}
	}

	throw new Error(`Failed to connect to MongoDB after ${maxRetryAttempts} attempts`)
}

export async function disconnectFromDatabase(): Promise<void> {
	if (!isDatabaseConnected()) return
	await mongoose.disconnect()
	logger.info('Disconnected from MongoDB')
}
