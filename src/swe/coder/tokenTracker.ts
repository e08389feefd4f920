export type TokenStatus = 'normal' | 'warning' | 'critical';

/** Read access to the token usage of a run, consulted between rounds */
export interface TokenBudget {
	status(): TokenStatus;
}

export interface TokenTrackerOptions {
	contextWindow?: number;
	warningThreshold?: number;
	criticalThreshold?: number;
}

export const DEFAULT_CONTEXT_WINDOW = 128_000;

/**
 * Tracks the tokens consumed by a run against the model's context window.
 */
export class TokenTracker implements TokenBudget {
	private _consumed = 0;
	readonly contextWindow: number;
	private readonly warningThreshold: number;
	private readonly criticalThreshold: number;

	constructor(options: TokenTrackerOptions = {}) {
		this.contextWindow = options.contextWindow ?? DEFAULT_CONTEXT_WINDOW;
		this.warningThreshold = options.warningThreshold ?? 0.8;
		this.criticalThreshold = options.criticalThreshold ?? 0.95;
	}

	get consumed(): number {
		return this._consumed;
	}

	get remaining(): number {
		return Math.max(0, this.contextWindow - this._consumed);
	}

	get usageRatio(): number {
		if (this.contextWindow <= 0) return 0;
		return this._consumed / this.contextWindow;
	}

	addConsumed(tokens: number): void {
		if (tokens > 0) this._consumed += tokens;
	}

	reset(): void {
		this._consumed = 0;
	}

	status(): TokenStatus {
		const ratio = this.usageRatio;
		if (ratio >= this.criticalThreshold) return 'critical';
		if (ratio >= this.warningThreshold) return 'warning';
		return 'normal';
	}

	/** A message for the user once usage passes the warning threshold */
	thresholdMessage(): string | null {
		const percent = Math.round(this.usageRatio * 100);
		switch (this.status()) {
			case 'critical':
				return `Context usage at ${percent}%. The run will stop after this round.`;
			case 'warning':
				return `Context usage at ${percent}%. Approaching the limit.`;
			case 'normal':
				return null;
		}
	}
}
