import type Anthropic from '@anthropic-ai/sdk'
import { z } from 'zod'
import { config } from '../config.js'

export const RESPOND_TOOL: Anthropic.Tool = {
	name: config.agent.toolName,
	description: 'Respond to the human, optionally editing the document.',
	input_schema: {
		type: 'object' as const,
		properties: {
			edits: {
				type: 'array',
				description: 'Exact-text replacements applied in order. Omit or leave empty to only reply.',
				items: {
					type: 'object',
					properties: {
						old: { type: 'string', description: 'Text to replace. Must occur exactly once in the current document.' },
						new: { type: 'string', description: 'Replacement text.' },
					},
					required: ['old', 'new'],
				},
			},
			message: {
				type: 'string',
				description: 'Your reply, appended to the conversation as comments.',
			},
		},
		required: ['message'],
	},
}

export const respondInputSchema = z.object({
	edits: z.array(z.object({ old: z.string(), new: z.string() })).default([]),
	message: z.string().default(''),
})
