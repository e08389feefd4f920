import type { LlmMessage } from '../../../shared/model/llm.model';
import type { SendMessage } from '../../swe/coder/searchReplaceOrchestrator';

export interface MockSendCall {
	message: string;
	history: ReadonlyArray<LlmMessage>;
}

/**
 * Scripted stand-in for the model. Replies are returned in the order they were queued.
 */
export class MockSender {
	private responses: (() => Promise<string>)[] = [];
	private calls: MockSendCall[] = [];

	/**
	 * Resets all configured responses and clears the call history.
	 * Should be called in `beforeEach` or `afterEach` for test isolation.
	 */
	reset(): void {
		this.responses = [];
		this.calls = [];
	}

	/** Queue the reply to the next message */
	addResponse(response: string): this {
		this.responses.push(() => Promise.resolve(response));
		return this;
	}

	/** Configures the next message to fail with the given error */
	rejectNext(error: Error): this {
		this.responses.push(() => Promise.reject(error));
		return this;
	}

	getCalls(): ReadonlyArray<MockSendCall> {
		return this.calls;
	}

	getCallCount(): number {
		return this.calls.length;
	}

	/**
	 * Throws an error if any queued responses were not consumed by the test.
	 */
	assertNoPendingResponses(): void {
		const pending = this.responses.length;
		if (pending > 0) {
			this.reset();
			throw new Error(`MockSender Error: Test finished with ${pending} unconsumed responses.`);
		}
	}

	/** The `SendMessage` function to give the orchestrator */
	readonly send: SendMessage = async (message, history) => {
		// Copy, as the caller may keep extending its history
		this.calls.push({ message, history: [...history] });
		const response = this.responses.shift();
		if (!response) throw new Error(`MockSender Error: No response queued for message ${this.calls.length}`);
		return response();
	};
}
