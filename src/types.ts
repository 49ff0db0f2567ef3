export type ErrorCode =
	| "VALIDATION_FAILED"
	| "INVALID_ORIGINAL"
	| "INVALID_REQUEST"
	| "INTERNAL_ERROR";

export interface ToolResponseEnvelope {
	valid: boolean;
	metadata: Record<string, unknown> | null;
	error: { code: ErrorCode; message: string; details?: unknown } | null;
}

export function createToolResponse(envelope: ToolResponseEnvelope) {
	return {
		content: [{ type: "text" as const, text: JSON.stringify(envelope) }],
	};
}
