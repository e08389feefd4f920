/**
 * Chat messages exchanged with the model. Only plain text content is supported,
 * the transport layer is responsible for any provider specific framing.
 */
export type LlmMessage = { role: 'system'; content: string } | { role: 'user'; content: string } | { role: 'assistant'; content: string };

export function system(text: string): LlmMessage {
	return { role: 'system', content: text };
}

export function user(text: string): LlmMessage {
	return { role: 'user', content: text };
}

/**
 * The model's reply, as recorded in the conversation history
 * @param text
 */
export function assistant(text: string): LlmMessage {
	return { role: 'assistant', content: text };
}
