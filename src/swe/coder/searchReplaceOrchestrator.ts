import { type LlmMessage, assistant, system, user } from '../../../shared/model/llm.model';
import { logger } from '../../o11y/logger';
import { errorToString } from '../../utils/errors';
import type { AgentResult, ApplyMode, ApplyOutcome, EditOperation, ParseOptions, ParsedResponse, RoundResult, StopReason } from './coderTypes';
import { parseEditResponse } from './editBlockParser';
import { buildRoundFeedback } from './services/reflectionGenerator';
import type { TokenBudget } from './tokenTracker';

/**
 * Sends a message to the model and resolves to its complete reply.
 * @param history The earlier messages of the conversation, not including `message`
 * @param signal Aborted when the run is cancelled, for transports which can stop a request in flight
 */
export type SendMessage = (message: string, history: readonly LlmMessage[], signal?: AbortSignal) => Promise<string>;

export interface EditApplier {
	applyAll(ops: readonly EditOperation[], projectRoot: string, mode: ApplyMode): Promise<ApplyOutcome[]>;
}

export interface StopPolicy {
	tokenBudget?: TokenBudget;
	signal?: AbortSignal;
}

/** Everything needed to run one round, so rounds can be replayed in isolation */
export interface ConversationState {
	/** 1-based number of the round this state starts */
	round: number;
	message: string;
	history: LlmMessage[];
}

export interface RoundStep {
	result: RoundResult;
	next: ConversationState;
}

export interface SearchReplaceOrchestratorOptions {
	send: SendMessage;
	applier: EditApplier;
	projectRoot: string;
	mode?: ApplyMode;
	parseOptions?: ParseOptions;
	/** Sent as the first message of the history */
	systemPrompt?: string;
	/** Called after each round, e.g. to display its outcomes */
	onRound?: (round: RoundResult) => void;
}

const CONTINUE_MESSAGE = 'Continue.';

/**
 * Runs the edit loop: each round sends a message, extracts the edits from the reply, applies them,
 * and builds the next message from their outcomes, until a stop condition is met.
 */
export class SearchReplaceOrchestrator {
	constructor(private readonly options: SearchReplaceOrchestratorOptions) {}

	async run(initialPrompt: string, maxRounds: number, stopPolicy: StopPolicy = {}): Promise<AgentResult> {
		const rounds: RoundResult[] = [];
		const finish = (stopReason: StopReason, error?: Error): AgentResult => {
			const result = summarise(rounds, stopReason, error);
			logger.info(`Edit loop finished after ${rounds.length} rounds: ${stopReason}`);
			return result;
		};

		if (stopPolicy.signal?.aborted) return finish('cancelled');
		if (stopPolicy.tokenBudget?.status() === 'critical') return finish('token-budget');
		if (maxRounds < 1) return finish('max-rounds');

		let state: ConversationState = {
			round: 1,
			message: initialPrompt,
			history: this.options.systemPrompt ? [system(this.options.systemPrompt)] : [],
		};

		while (true) {
			let step: RoundStep;
			try {
				step = await this.runRound(state, stopPolicy.signal);
			} catch (e) {
				if (stopPolicy.signal?.aborted) return finish('cancelled');
				const error = e instanceof Error ? e : new Error(errorToString(e));
				logger.error({ err: error }, `Round ${state.round} failed`);
				return finish('send-failed', error);
			}

			const stopReason = decide(step.result, maxRounds, stopPolicy);
			const result: RoundResult = { ...step.result, shouldContinue: stopReason === null };
			rounds.push(result);
			this.options.onRound?.(result);

			if (stopReason) return finish(stopReason);
			state = step.next;
		}
	}

	/**
	 * SEND, RECEIVE, EXTRACT and APPLY for one round. Deciding whether to continue is left to the caller.
	 * The returned state holds the feedback message for the next round.
	 * Rejects when the model cannot be reached.
	 */
	async runRound(state: ConversationState, signal?: AbortSignal): Promise<RoundStep> {
		logger.info(`Round ${state.round}: sending ${state.message.length} chars`);
		const response = await this.options.send(state.message, state.history, signal);

		const parsed: ParsedResponse = parseEditResponse(response, this.options.parseOptions);
		logger.info(`Round ${state.round}: extracted ${parsed.edits.length} edits (${parsed.format})`);

		const outcomes = parsed.edits.length ? await this.options.applier.applyAll(parsed.edits, this.options.projectRoot, this.options.mode ?? 'confirm') : [];

		const result: RoundResult = {
			round: state.round,
			response,
			format: parsed.format,
			continueRequested: parsed.continueRequested,
			attempted: parsed.edits,
			outcomes,
			shouldContinue: parsed.edits.length > 0 || parsed.continueRequested,
		};
		const next: ConversationState = {
			round: state.round + 1,
			message: outcomes.length ? buildRoundFeedback(outcomes) : CONTINUE_MESSAGE,
			history: [...state.history, user(state.message), assistant(response)],
		};
		return { result, next };
	}
}

/** The stop conditions in priority order. Null when the loop should continue */
function decide(round: RoundResult, maxRounds: number, stopPolicy: StopPolicy): StopReason | null {
	if (round.attempted.length === 0 && !round.continueRequested) return 'no-actions';
	if (round.round >= maxRounds) return 'max-rounds';
	if (stopPolicy.tokenBudget?.status() === 'critical') return 'token-budget';
	if (stopPolicy.signal?.aborted) return 'cancelled';
	return null;
}

function summarise(rounds: RoundResult[], stopReason: StopReason, error?: Error): AgentResult {
	const appliedPaths: string[] = [];
	let failedCount = 0;
	for (const outcome of rounds.flatMap((round) => round.outcomes)) {
		if (outcome.status === 'failed') failedCount++;
		else if (!appliedPaths.includes(outcome.path)) appliedPaths.push(outcome.path);
	}
	const result: AgentResult = { rounds, stopReason, appliedPaths, failedCount };
	if (error) result.error = error;
	return result;
}
