/**
 * How much of the target file an edit operation covers.
 * - region: a SEARCH/REPLACE block. `search` is the region to find, `replace` its replacement
 * - file: a whole-file fallback format. `replace` is the complete new content
 * - patch: a unified diff fallback. `replace` holds the hunk text
 */
export type EditGranularity = 'region' | 'file' | 'patch';

export interface EditOperation {
	readonly path: string; // Relative to the project root
	readonly search: string;
	readonly replace: string;
	readonly granularity: EditGranularity;
}

export type EditKind = 'create' | 'delete' | 'modify' | 'replace-file' | 'patch';

export function editKind(op: EditOperation): EditKind {
	if (op.granularity === 'file') return 'replace-file';
	if (op.granularity === 'patch') return 'patch';
	if (op.search === '') return 'create';
	if (op.replace === '') return 'delete';
	return 'modify';
}

/** Which parser produced the operations of a response */
export type EditFormat = 'search-replace' | 'fenced-file' | 'unified-diff' | 'file-marker' | 'none';

export interface ParsedResponse {
	edits: EditOperation[];
	format: EditFormat;
	/** The response contained the continue signal line */
	continueRequested: boolean;
	warnings: string[];
}

export type IncompleteBlockPolicy = 'drop' | 'warn';

export interface ParseOptions {
	incompleteBlocks?: IncompleteBlockPolicy;
	continueSignal?: string;
}

export type MatchTier = 'exact' | 'whitespace' | 'indent';

export const MATCH_TIERS: readonly MatchTier[] = ['exact', 'whitespace', 'indent'];

export type MatchResult =
	| { found: true; tier: MatchTier; startOffset: number; endOffset: number }
	| { found: false; attemptedTiers: MatchTier[]; fileSnapshot: string };

export type ApplyMode = 'confirm' | 'auto-apply' | 'dry-run';

export type CreateExistingPolicy = 'append' | 'overwrite' | 'reject';

export type FailureReason =
	| 'no-match'
	| 'file-not-found'
	| 'path-rejected'
	| 'blocked-pattern'
	| 'filesystem-error'
	| 'invalid-operation'
	| 'create-conflict'
	| 'declined';

export function isSafetyRejection(reason: FailureReason): boolean {
	return reason === 'path-rejected' || reason === 'blocked-pattern';
}

export interface AppliedOutcome {
	status: 'applied';
	path: string;
	/** e.g. "updated src/a.ts (+2 -1)" */
	summary: string;
	/** false for dry runs */
	written: boolean;
	diff: string;
	tier?: MatchTier;
	advisories: string[];
}

export interface FailedOutcome {
	status: 'failed';
	path: string;
	reason: FailureReason;
	message: string;
	/** Current (head-truncated) content of the target file, when it could be read */
	snapshot?: string;
	advisories: string[];
	operation: EditOperation;
}

export type ApplyOutcome = AppliedOutcome | FailedOutcome;

export interface RoundResult {
	round: number;
	response: string;
	format: EditFormat;
	continueRequested: boolean;
	/** The edit operations extracted from the response, in the order they were applied */
	attempted: EditOperation[];
	outcomes: ApplyOutcome[];
	shouldContinue: boolean;
}

export type StopReason = 'no-actions' | 'max-rounds' | 'token-budget' | 'cancelled' | 'send-failed';

export interface AgentResult {
	rounds: RoundResult[];
	stopReason: StopReason;
	/** Distinct paths with at least one applied operation, in first-applied order */
	appliedPaths: string[];
	failedCount: number;
	error?: Error;
}
