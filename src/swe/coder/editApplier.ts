import * as path from 'node:path';
import type { IFileSystemService } from '../../../shared/files/fileSystemService';
import type { VersionControlSystem } from '../../../shared/scm/versionControlSystem';
import { Git } from '../../functions/scm/git';
import { FileSystemService } from '../../functions/storage/fileSystemService';
import { logger } from '../../o11y/logger';
import { errorToString } from '../../utils/errors';
import {
	type AppliedOutcome,
	type ApplyMode,
	type ApplyOutcome,
	type CreateExistingPolicy,
	type EditKind,
	type EditOperation,
	type FailedOutcome,
	type FailureReason,
	type MatchTier,
	editKind,
} from './coderTypes';
import { findSearchText, truncateSnapshot } from './editMatcher';
import { applyUnifiedPatch, formatRegionDiff, replaceRange } from './patchUtils';
import { BlockedPatternRule, DEFAULT_BLOCKED_WRITE_PATTERNS } from './validators/blockedPatternRule';
import { validateOperation } from './validators/compositeValidator';
import { PathContainmentRule } from './validators/pathContainmentRule';
import type { ValidationIssue, ValidationRule } from './validators/validationRule';

export interface EditConfirmationRequest {
	path: string;
	kind: EditKind;
	diff: string;
}

/** Asks the user whether an edit may be written. Resolves to false to decline it. */
export type ConfirmEdit = (request: EditConfirmationRequest) => Promise<boolean>;

export interface FileEditApplierOptions {
	/** Copy an existing file to `<file>.bak` before it is first overwritten in a batch. Defaults to true */
	createBackups?: boolean;
	/** What an empty SEARCH does when the file already exists. Defaults to 'append' */
	createExisting?: CreateExistingPolicy;
	blockedWritePatterns?: readonly string[];
	/** Replaces the default path containment and blocked pattern rules */
	rules?: ValidationRule[];
	/** Required in the 'confirm' mode. Without it every edit is declined */
	confirm?: ConfirmEdit;
	fileSystem?: (projectRoot: string) => IFileSystemService;
	/** Returns null when the project is not under version control */
	vcs?: (projectRoot: string) => VersionControlSystem | null;
}

/** State of one applyAll call */
interface Batch {
	projectRoot: string;
	mode: ApplyMode;
	fs: IFileSystemService;
	vcs: VersionControlSystem | null;
	/** Latest content of each touched path, null while the file does not exist */
	contents: Map<string, string | null>;
	existedOnDisk: Set<string>;
	backedUp: Set<string>;
	advisories: Map<string, string[]>;
}

type ComputedEdit = { content: string; tier?: MatchTier } | FailedOutcome;

/**
 * Applies edit operations to the files of a project, in order, under the safety rules.
 * Each operation sees the result of the earlier successful operations on the same path,
 * including in the 'dry-run' mode where nothing is written.
 */
export class FileEditApplier {
	private readonly rules: ValidationRule[];

	constructor(private readonly options: FileEditApplierOptions = {}) {
		this.rules = options.rules ?? [new PathContainmentRule(), new BlockedPatternRule(options.blockedWritePatterns ?? DEFAULT_BLOCKED_WRITE_PATTERNS)];
	}

	async applyAll(ops: readonly EditOperation[], projectRoot: string, mode: ApplyMode = 'confirm'): Promise<ApplyOutcome[]> {
		const root = path.resolve(projectRoot);
		const batch: Batch = {
			projectRoot: root,
			mode,
			fs: this.options.fileSystem ? this.options.fileSystem(root) : new FileSystemService(root),
			vcs: this.options.vcs ? this.options.vcs(root) : new Git(root),
			contents: new Map(),
			existedOnDisk: new Set(),
			backedUp: new Set(),
			advisories: new Map(),
		};

		const outcomes: ApplyOutcome[] = [];
		for (const op of ops) {
			outcomes.push(await this.applyOne(op, batch));
		}
		const failed = outcomes.filter((outcome) => outcome.status === 'failed').length;
		logger.info(`Applied ${outcomes.length - failed} of ${outcomes.length} edits (${mode})`);
		return outcomes;
	}

	private async applyOne(op: EditOperation, batch: Batch): Promise<ApplyOutcome> {
		const issue = validateOperation(op, batch.projectRoot, this.rules);
		if (issue) {
			logger.warn(`Rejected edit to ${op.path}: ${issue.message}`);
			return failure(op, issue.reason, issue.message, []);
		}

		const relativePath = path.relative(batch.projectRoot, path.resolve(batch.projectRoot, op.path));
		let linkIssue: ValidationIssue | null;
		try {
			linkIssue = await this.checkRealPath(op, relativePath, batch);
		} catch (e) {
			logger.error({ err: e }, `Failed to resolve ${op.path}`);
			return failure(op, 'filesystem-error', `Could not resolve ${op.path}: ${errorToString(e)}`, []);
		}
		if (linkIssue) {
			logger.warn(`Rejected edit to ${op.path}: ${linkIssue.message}`);
			return failure(op, linkIssue.reason, linkIssue.message, []);
		}

		const advisories = await this.dirtyAdvisories(relativePath, batch);

		let current: string | null;
		try {
			current = await this.currentContent(relativePath, batch);
		} catch (e) {
			logger.error({ err: e }, `Failed to read ${op.path}`);
			return failure(op, 'filesystem-error', `Could not read ${op.path}: ${errorToString(e)}`, advisories);
		}

		const computed = this.computeContent(op, current, advisories);
		if ('status' in computed) {
			logger.info(`Edit to ${op.path} failed: ${computed.message}`);
			return computed;
		}

		const kind = editKind(op);
		const { diff, added, removed } = formatRegionDiff(op.path, current, computed.content);
		const verb = current === null ? 'created' : 'updated';

		if (batch.mode === 'dry-run') {
			batch.contents.set(relativePath, computed.content);
			return applied(op.path, `would have ${verb} ${op.path} (+${added} -${removed})`, false, diff, computed.tier, advisories);
		}

		if (batch.mode === 'confirm') {
			let accepted = false;
			if (this.options.confirm) {
				try {
					accepted = await this.options.confirm({ path: op.path, kind, diff });
				} catch (e) {
					logger.error({ err: e }, `Confirmation of the edit to ${op.path} failed`);
				}
			}
			if (!accepted) return failure(op, 'declined', `The edit to ${op.path} was declined`, advisories);
		}

		try {
			await this.backupOnce(relativePath, batch);
			await batch.fs.writeFile(relativePath, computed.content);
		} catch (e) {
			logger.error({ err: e }, `Failed to write ${op.path}`);
			return failure(op, 'filesystem-error', `Could not write ${op.path}: ${errorToString(e)}`, advisories);
		}
		batch.contents.set(relativePath, computed.content);
		logger.info(`${verb} ${op.path}`);
		return applied(op.path, `${verb} ${op.path} (+${added} -${removed})`, true, diff, computed.tier, advisories);
	}

	private computeContent(op: EditOperation, current: string | null, advisories: string[]): ComputedEdit {
		switch (op.granularity) {
			case 'file':
				return { content: op.replace };
			case 'patch':
				try {
					return { content: applyUnifiedPatch(current ?? '', op.replace) };
				} catch (e) {
					return failure(op, 'no-match', `The patch for ${op.path} could not be applied: ${errorToString(e)}`, advisories, snapshotOf(current));
				}
			case 'region':
				break;
		}

		if (op.search === '') {
			if (op.replace === '') return failure(op, 'invalid-operation', `The edit to ${op.path} has empty SEARCH and REPLACE sections`, advisories);
			if (current === null) return { content: op.replace };

			switch (this.options.createExisting ?? 'append') {
				case 'append':
					return { content: current === '' || current.endsWith('\n') ? current + op.replace : `${current}\n${op.replace}` };
				case 'overwrite':
					return { content: op.replace };
				case 'reject':
					return failure(
						op,
						'create-conflict',
						`${op.path} already exists. Use a SEARCH section with the existing lines to change it`,
						advisories,
						truncateSnapshot(current),
					);
			}
		}

		if (current === null) {
			return failure(op, 'file-not-found', `${op.path} does not exist. To create a new file use an empty SEARCH section`, advisories);
		}

		const match = findSearchText(current, op.search);
		if (!match.found) {
			return failure(
				op,
				'no-match',
				`The SEARCH section did not match the content of ${op.path} (tried ${match.attemptedTiers.join(', ')} matching)`,
				advisories,
				match.fileSnapshot,
			);
		}
		return { content: replaceRange(current, match.startOffset, match.endOffset, op.replace), tier: match.tier };
	}

	/**
	 * Follows the symbolic links in the target path, and in its nearest existing parent for a new file.
	 * The real path must stay inside the real project root and pass the rules as well.
	 */
	private async checkRealPath(op: EditOperation, relativePath: string, batch: Batch): Promise<ValidationIssue | null> {
		const realRoot = await batch.fs.realPath('.');
		const realRelative = path.relative(realRoot, await batch.fs.realPath(relativePath));
		if (realRelative === relativePath) return null;

		if (realRelative === '' || realRelative === '..' || realRelative.startsWith(`..${path.sep}`) || path.isAbsolute(realRelative)) {
			return { file: op.path, reason: 'path-rejected', message: `${op.path} links to a location outside the project root` };
		}
		const issue = validateOperation({ ...op, path: realRelative }, realRoot, this.rules);
		if (!issue) return null;
		return { file: op.path, reason: issue.reason, message: `${op.path} links to ${realRelative}. ${issue.message}` };
	}

	/** The content produced by earlier operations in the batch, read from disk on first touch */
	private async currentContent(relativePath: string, batch: Batch): Promise<string | null> {
		const cached = batch.contents.get(relativePath);
		if (cached !== undefined) return cached;

		if (!(await batch.fs.fileExists(relativePath))) {
			batch.contents.set(relativePath, null);
			return null;
		}
		const content = await batch.fs.readFile(relativePath);
		batch.contents.set(relativePath, content);
		batch.existedOnDisk.add(relativePath);
		return content;
	}

	private async backupOnce(relativePath: string, batch: Batch): Promise<void> {
		if (this.options.createBackups === false) return;
		if (!batch.existedOnDisk.has(relativePath) || batch.backedUp.has(relativePath)) return;
		await batch.fs.copyFile(relativePath, `${relativePath}.bak`);
		batch.backedUp.add(relativePath);
		logger.debug(`Backed up ${relativePath} to ${relativePath}.bak`);
	}

	/** Checks the version control status of each path once per batch */
	private async dirtyAdvisories(relativePath: string, batch: Batch): Promise<string[]> {
		const existing = batch.advisories.get(relativePath);
		if (existing) return existing;

		const advisories: string[] = [];
		if (batch.vcs) {
			try {
				if (await batch.vcs.isDirty(relativePath)) {
					advisories.push(`${relativePath} has uncommitted changes`);
					logger.warn(`${relativePath} has uncommitted changes which the edit will be mixed with`);
				}
			} catch (e) {
				logger.debug({ err: e }, `Could not check the version control status of ${relativePath}`);
			}
		}
		batch.advisories.set(relativePath, advisories);
		return advisories;
	}
}

function snapshotOf(content: string | null): string | undefined {
	return content === null ? undefined : truncateSnapshot(content);
}

function failure(op: EditOperation, reason: FailureReason, message: string, advisories: string[], snapshot?: string): FailedOutcome {
	const outcome: FailedOutcome = { status: 'failed', path: op.path, reason, message, advisories, operation: op };
	if (snapshot !== undefined) outcome.snapshot = snapshot;
	return outcome;
}

function applied(filePath: string, summary: string, written: boolean, diff: string, tier: MatchTier | undefined, advisories: string[]): AppliedOutcome {
	const outcome: AppliedOutcome = { status: 'applied', path: filePath, summary, written, diff, advisories };
	if (tier) outcome.tier = tier;
	return outcome;
}
