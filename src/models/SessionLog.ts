import mongoose, { type Document, type Model, Schema } from 'mongoose'

interface LogEntryDoc {
	timestamp: string
	level: string
	message: string
	context?: Record<string, unknown>
}

export interface ISessionLog extends Document {
	entries: LogEntryDoc[]
	createdAt: Date
}

const sessionLogSchema = new Schema<ISessionLog>({
	entries: [{
		timestamp: { type: String, required: true },
		level: { type: String, required: true },
		message: { type: String, required: true },
		context: { type: Schema.Types.Mixed },
	}],
}, {
	timestamps: { createdAt: true, updatedAt: false },
})

sessionLogSchema.index({ createdAt: -1 })

const SessionLogModel: Model<ISessionLog> = mongoose.model<ISessionLog>('SessionLog', sessionLogSchema)

export default SessionLogModel
