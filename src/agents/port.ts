import type { Edit } from '../document/patch.js'

export interface AgentRequest {
	/** Snapshot of the full document at call time. */
	document: string
	/** Error produced by the previous batch, so the collaborator can correct itself. */
	lastError?: string
}

export interface AgentResponse {
	edits: Edit[]
	message: string
}

/** The external collaborator that proposes edit batches. Its output is untrusted. */
export interface AgentPort {
	propose(request: AgentRequest): Promise<AgentResponse>
}
