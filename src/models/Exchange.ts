import mongoose, { type Document, type Model, Schema } from 'mongoose'

// One document per collaborator round trip, for auditing by the operator. Nothing reads these back at runtime.

export interface IExchange extends Document {
	modelId: string
	documentChars: number
	lastError: string | null
	response: unknown[]
	inputTokens: number
	outputTokens: number
	cacheWriteTokens: number
	cacheReadTokens: number
	cost: number
	stopReason: string
	createdAt: Date
}

const exchangeSchema = new Schema<IExchange>({
	modelId: { type: String, required: true },
	documentChars: { type: Number, required: true },
	lastError: { type: String, default: null },
	response: { type: Schema.Types.Mixed, required: true },
	inputTokens: { type: Number, required: true },
	outputTokens: { type: Number, required: true },
	cacheWriteTokens: { type: Number, default: 0 },
	cacheReadTokens: { type: Number, default: 0 },
	cost: { type: Number, required: true },
	stopReason: { type: String, required: true },
}, {
	timestamps: { createdAt: true, updatedAt: false },
})

exchangeSchema.index({ createdAt: -1 })

const ExchangeModel: Model<IExchange> = mongoose.model<IExchange>('Exchange', exchangeSchema)

export default ExchangeModel
