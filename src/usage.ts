import logger from './logger.js'

interface ModelPricing {
	inputPerMTok: number
	cacheWritePerMTok: number
	cacheReadPerMTok: number
	outputPerMTok: number
}

const PRICING: Record<string, ModelPricing> = {
	'claude-opus-4-6':   { inputPerMTok: 5, cacheWritePerMTok: 6.25, cacheReadPerMTok: 0.50, outputPerMTok: 25 },
	'claude-sonnet-4-5': { inputPerMTok: 3, cacheWritePerMTok: 3.75, cacheReadPerMTok: 0.30, outputPerMTok: 15 },
	'claude-haiku-4-5':  { inputPerMTok: 1, cacheWritePerMTok: 1.25, cacheReadPerMTok: 0.10, outputPerMTok: 5 },
}

// Unknown models are priced at the most expensive tier
const DEFAULT_PRICING: ModelPricing = { inputPerMTok: 5, cacheWritePerMTok: 6.25, cacheReadPerMTok: 0.50, outputPerMTok: 25 }

export interface ApiUsage {
	input_tokens: number
	output_tokens: number
	cache_creation_input_tokens?: number | null
	cache_read_input_tokens?: number | null
}

interface UsageEntry {
	model: string
	inputTokens: number
	outputTokens: number
	cacheWriteTokens: number
	cacheReadTokens: number
	cost: number
}

const entries: UsageEntry[] = []

export function computeCost(model: string, usage: ApiUsage): number {
	const pricing = PRICING[model] ?? DEFAULT_PRICING
	const cacheWrite = usage.cache_creation_input_tokens ?? 0
	const cacheRead = usage.cache_read_input_tokens ?? 0
	const uncached = Math.max(0, usage.input_tokens - cacheWrite - cacheRead)

	const inputCost = uncached * pricing.inputPerMTok
		+ cacheWrite * pricing.cacheWritePerMTok
		+ cacheRead * pricing.cacheReadPerMTok
	const outputCost = usage.output_tokens * pricing.outputPerMTok

	return (inputCost + outputCost) / 1_000_000
}

export function trackUsage(model: string, usage: ApiUsage): number {
	const cost = computeCost(model, usage)
	entries.push({
		model,
		inputTokens: usage.input_tokens,
		outputTokens: usage.output_tokens,
		cacheWriteTokens: usage.cache_creation_input_tokens ?? 0,
		cacheReadTokens: usage.cache_read_input_tokens ?? 0,
		cost,
	})
	return cost
}

export function getSessionCost(): number {
	return entries.reduce((sum, e) => sum + e.cost, 0)
}

export function logSummary(): void {
	if (entries.length === 0) {
		logger.info('No API calls recorded.')
		return
	}

	interface Agg { inputTokens: number; outputTokens: number; cacheRead: number; cost: number; calls: number }
	const emptyAgg = (): Agg => ({ inputTokens: 0, outputTokens: 0, cacheRead: 0, cost: 0, calls: 0 })

	const byModel = new Map<string, Agg>()
	const totals = emptyAgg()

	for (const e of entries) {
		totals.inputTokens += e.inputTokens
		totals.outputTokens += e.outputTokens
		totals.cacheRead += e.cacheReadTokens

		const m = byModel.get(e.model) ?? emptyAgg()
		m.inputTokens += e.inputTokens
		m.outputTokens += e.outputTokens
		m.cacheRead += e.cacheReadTokens
		m.cost += e.cost
		m.calls++
		byModel.set(e.model, m)
	}

	const cachePct = totals.inputTokens > 0 ? Math.round((totals.cacheRead / totals.inputTokens) * 100) : 0
	logger.info(`Usage: ${entries.length} API calls | ${totals.inputTokens} in (${cachePct}% cached) + ${totals.outputTokens} out tokens | $${getSessionCost().toFixed(4)}`)
	for (const [model, s] of [...byModel].sort((a, b) => b[1].cost - a[1].cost)) {
		logger.info(`  ${model}: ${s.calls} calls | ${s.inputTokens} in + ${s.outputTokens} out | $${s.cost.toFixed(4)}`)
	}
}

export function resetUsage(): void {
	entries.length = 0
}
