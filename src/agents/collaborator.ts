import type Anthropic from '@anthropic-ai/sdk'
import { config } from '../config.js'
import logger from '../logger.js'
import { AgentProtocolError } from '../errors.js'
import { isDatabaseConnected } from '../database.js'
import ExchangeModel from '../models/Exchange.js'
import { callApi } from '../llm/api.js'
import { SYSTEM_PROMPT } from '../llm/prompts.js'
import { RESPOND_TOOL, respondInputSchema } from '../llm/tools.js'
import { trackUsage } from '../usage.js'
import type { AgentPort, AgentRequest, AgentResponse } from './port.js'

export function buildPrompt(request: AgentRequest): string {
	const errorContext = request.lastError ? `\n<error>${request.lastError}</error>\nPlease fix this.` : ''
	return `<source>\n${request.document}\n</source>${errorContext}`
}

async function recordExchange(request: AgentRequest, response: Anthropic.Message, cost: number): Promise<void> {
	if (!isDatabaseConnected()) return
	try {
		await ExchangeModel.create({
			modelId: response.model,
			documentChars: request.document.length,
			lastError: request.lastError ?? null,
			response: response.content,
			inputTokens: response.usage.input_tokens,
			outputTokens: response.usage.output_tokens,
			cacheWriteTokens: response.usage.cache_creation_input_tokens ?? 0,
			cacheReadTokens: response.usage.cache_read_input_tokens ?? 0,
			cost,
			stopReason: response.stop_reason ?? 'unknown',
		})
	} catch (err) {
		logger.error('Failed to save exchange', { error: err instanceof Error ? err.message : String(err) })
	}
}

/** AgentPort backed by the Anthropic Messages API, with the respond tool forced on every call. */
export class AnthropicCollaborator implements AgentPort {
	async propose(request: AgentRequest): Promise<AgentResponse> {
		logger.info(`Requesting edits (${request.document.length} chars${request.lastError ? ', with error context' : ''})`)
		const response = await callApi({
			system: SYSTEM_PROMPT,
			messages: [{ role: 'user', content: buildPrompt(request) }],
			tools: [RESPOND_TOOL],
			toolChoice: { type: 'tool', name: config.agent.toolName },
		})

		const cost = trackUsage(response.model, {
			input_tokens: response.usage.input_tokens,
			output_tokens: response.usage.output_tokens,
			cache_creation_input_tokens: response.usage.cache_creation_input_tokens,
			cache_read_input_tokens: response.usage.cache_read_input_tokens,
		})
		await recordExchange(request, response, cost)

		const toolUse = response.content.find((block): block is Anthropic.ToolUseBlock => block.type === 'tool_use')
		if (!toolUse) throw new AgentProtocolError('No tool response')

		const parsed = respondInputSchema.safeParse(toolUse.input)
		if (!parsed.success) {
			const issue = parsed.error.issues[0]
			throw new AgentProtocolError(`Malformed tool response: ${issue.path.join('.') || 'input'} ${issue.message}`)
		}

		logger.info(`Collaborator proposed ${parsed.data.edits.length} edit(s)`, { cost })
		return parsed.data
	}
}
