import type { LanguageModelV1, LanguageModelV1CallOptions, LanguageModelV1Prompt } from '@ai-sdk/provider';
import { expect } from 'chai';
import { TokenTracker } from '../../swe/coder/tokenTracker';
import { setupConditionalLoggerOutput } from '../../test/testUtils';
import { createAiSdkSender } from './aiSdkSender';

/** Replies with a fixed text and records the prompts it was given */
class ScriptedModel implements LanguageModelV1 {
	readonly specificationVersion = 'v1';
	readonly provider = 'test';
	readonly modelId = 'test-model';
	readonly defaultObjectGenerationMode = undefined;
	readonly prompts: LanguageModelV1Prompt[] = [];

	constructor(private readonly reply: string) {}

	async doGenerate(options: LanguageModelV1CallOptions): Promise<Awaited<ReturnType<LanguageModelV1['doGenerate']>>> {
		this.prompts.push(options.prompt);
		return {
			rawCall: { rawPrompt: null, rawSettings: {} },
			finishReason: 'stop',
			usage: { promptTokens: 120, completionTokens: 30 },
			text: this.reply,
		};
	}

	async doStream(): Promise<Awaited<ReturnType<LanguageModelV1['doStream']>>> {
		throw new Error('Streaming is not used');
	}
}

describe('createAiSdkSender', () => {
	setupConditionalLoggerOutput();

	it('should send the history and the message, and record the token usage', async () => {
		const model = new ScriptedModel('a.py\n<<<<<<< SEARCH');
		const tokenTracker = new TokenTracker({ contextWindow: 1000 });
		const send = createAiSdkSender({ model, tokenTracker });

		const reply = await send('Set x to 2', [
			{ role: 'system', content: 'You edit files.' },
			{ role: 'user', content: 'Hello' },
			{ role: 'assistant', content: 'Hi' },
		]);

		expect(reply).to.equal('a.py\n<<<<<<< SEARCH');
		expect(tokenTracker.consumed).to.equal(150);
		expect(model.prompts.map((prompt) => prompt.map((message) => message.role))).to.deep.equal([['system', 'user', 'assistant', 'user']]);
	});
});
