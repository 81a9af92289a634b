const env = process.env.NODE_ENV ?? 'production'
const isProduction = env === 'production'

// Hardcoded constants. Secrets and deployment-specific values live in env.ts.

export const config = {
	env,
	isProduction,

	// Document layout: the marker line splits the kernel region (above) from the log region (at and below)
	document: {
		marker: '// === CONVERSATION ===',
		commentPrefix: '//',
		lineSeparator: '\n',
		kernelFileName: 'kernel.ts',
	},

	// Collaborator model and output budget
	agent: {
		model: isProduction ? 'claude-sonnet-4-5' : 'claude-haiku-4-5',
		maxTokens: 4096,
		toolName: 'respond',
	},

	// Anthropic API retry strategy for rate limits, and the per-request timeout
	api: {
		maxRetries: 3,
		initialRetryDelay: 5_000, // 5 seconds
		maxRetryDelay: 60_000, // 1 minute
		requestTimeout: 120_000, // 2 minutes
	},

	// Kernel execution
	reload: {
		executeTimeout: 1_000, // top-level kernel code must finish within 1 second
		exportName: 'behavior',
		operations: ['handleKey', 'render'],
	},

	// Error previews and status line truncation
	messages: {
		notFoundPreview: 30,
		ambiguousPreview: 20,
		status: 60,
		editFailure: 50,
		shortFailure: 40,
	},

	// Database connection configuration
	db: {
		maxRetryAttempts: 5,
		retryInterval: 5_000, // 5 seconds
	},
} as const
