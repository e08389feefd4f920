import { createOpenAI } from '@ai-sdk/openai';
import { type CoreMessage, type LanguageModel, generateText } from 'ai';
import type { LlmMessage } from '../../../shared/model/llm.model';
import { logger } from '../../o11y/logger';
import type { SendMessage } from '../../swe/coder/searchReplaceOrchestrator';
import type { TokenTracker } from '../../swe/coder/tokenTracker';

export interface OpenAiModelOptions {
	modelId: string;
	/** For OpenAI compatible servers */
	baseUrl?: string;
	apiKey?: string;
}

/**
 * Creates a chat model for the OpenAI API, or any server with an OpenAI compatible API.
 */
export function createOpenAiModel(options: OpenAiModelOptions): LanguageModel {
	const provider = createOpenAI({ apiKey: options.apiKey, baseURL: options.baseUrl, compatibility: options.baseUrl ? 'compatible' : 'strict' });
	return provider(options.modelId);
}

export interface AiSdkSenderOptions {
	model: LanguageModel;
	/** Records the prompt and completion tokens of each reply */
	tokenTracker?: TokenTracker;
	temperature?: number;
}

function toCoreMessage(message: LlmMessage): CoreMessage {
	switch (message.role) {
		case 'system':
			return { role: 'system', content: message.content };
		case 'user':
			return { role: 'user', content: message.content };
		case 'assistant':
			return { role: 'assistant', content: message.content };
	}
}

/**
 * A SendMessage function which generates the reply with the Vercel ai package.
 */
export function createAiSdkSender(options: AiSdkSenderOptions): SendMessage {
	return async (message, history, signal) => {
		const messages = [...history, { role: 'user', content: message } satisfies LlmMessage].map(toCoreMessage);
		const started = Date.now();

		const result = await generateText({ model: options.model, messages, temperature: options.temperature, abortSignal: signal });

		const { promptTokens, completionTokens } = result.usage;
		options.tokenTracker?.addConsumed(promptTokens + completionTokens);
		logger.info(
			{ promptTokens, completionTokens, finishReason: result.finishReason },
			`Received ${result.text.length} chars from ${options.model.modelId} in ${Date.now() - started}ms`,
		);
		return result.text;
	};
}
