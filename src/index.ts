#!/usr/bin/env node
import { run } from './app.js'
import logger from './logger.js'

// Exit explicitly: idle keep-alive sockets from the API client would otherwise hold the process open
run().then(() => process.exit(0), error => {
	logger.error('Fatal error in duet', {
		error: error instanceof Error ? error.message : String(error),
		stack: error instanceof Error ? error.stack : undefined,
	})
	process.exit(1)
})
