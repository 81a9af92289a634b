import Anthropic from '@anthropic-ai/sdk'
import { config } from '../config.js'
import { env } from '../env.js'
import logger from '../logger.js'

const client = new Anthropic({ apiKey: env.anthropicApiKey, timeout: config.api.requestTimeout })

export interface ApiRequest {
	system: string
	messages: Anthropic.MessageParam[]
	tools?: Anthropic.Tool[]
	toolChoice?: Anthropic.ToolChoice
}

function statusOf(error: unknown): number {
	if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
		return error.status
	}
	return 0
}

export function buildParams(request: ApiRequest): Anthropic.MessageCreateParamsNonStreaming {
	const { model, maxTokens } = config.agent
	return {
		model,
		max_tokens: maxTokens,
		system: request.system,
		messages: request.messages,
		...(request.tools && request.tools.length > 0 && { tools: request.tools }),
		...(request.toolChoice && { tool_choice: request.toolChoice }),
	}
}

// Only rate limits are retried. Anything else, timeouts included, goes back to the caller.
export async function callApi(request: ApiRequest): Promise<Anthropic.Message> {
	const params = buildParams(request)
	const { maxRetries, initialRetryDelay, maxRetryDelay } = config.api
	for (let attempt = 0; ; attempt++) {
		try {
			return await client.messages.create(params)
		} catch (error: unknown) {
			if (statusOf(error) === 429 && attempt < maxRetries) {
				const delay = Math.min(maxRetryDelay, initialRetryDelay * 2 ** attempt)
				logger.warn(`Rate limited, waiting ${Math.round(delay / 1000)}s before retry (attempt ${attempt + 1}/${maxRetries})...`)
				await new Promise(r => setTimeout(r, delay))
				continue
			}
			throw error
		}
	}
}
