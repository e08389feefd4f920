import { expect } from 'chai';
import { setupConditionalLoggerOutput } from '../../../test/testUtils';
import type { AppliedOutcome, EditOperation, FailedOutcome, FailureReason } from '../coderTypes';
import { RETRY_INSTRUCTION, buildRoundFeedback } from './reflectionGenerator';

function applied(path: string): AppliedOutcome {
	return { status: 'applied', path, summary: `updated ${path} (+1 -1)`, written: true, diff: '', advisories: [] };
}

function failed(path: string, reason: FailureReason, operation: Partial<EditOperation>, snapshot?: string): FailedOutcome {
	const outcome: FailedOutcome = {
		status: 'failed',
		path,
		reason,
		message: `${reason} message`,
		advisories: [],
		operation: { path, search: 'old', replace: 'new', granularity: 'region', ...operation },
	};
	if (snapshot !== undefined) outcome.snapshot = snapshot;
	return outcome;
}

describe('buildRoundFeedback', () => {
	setupConditionalLoggerOutput();

	it('should only list the paths of applied edits', () => {
		const feedback = buildRoundFeedback([applied('a.py'), applied('b.py'), applied('a.py')]);

		expect(feedback).to.equal(
			'Successfully applied changes to: a.py, b.py\n\nContinue with any remaining changes. Reply without edit blocks when the task is complete.',
		);
	});

	it('should include the failed block and the file snapshot verbatim', () => {
		const snapshot = 'x = 1\nz = 3\n';
		const feedback = buildRoundFeedback([failed('a.py', 'no-match', { search: 'y = 1', replace: 'y = 2' }, snapshot)]);

		expect(feedback).to.equal(
			'# 1 edit could not be applied\n\n' +
				'## FAILED to apply edit to a.py: no-match message\n' +
				'a.py\n<<<<<<< SEARCH\ny = 1\n=======\ny = 2\n>>>>>>> REPLACE\n\n' +
				'Current content of a.py:\n```\nx = 1\nz = 3\n```\n\n\n' +
				RETRY_INSTRUCTION,
		);
		expect(feedback).to.contain(snapshot);
	});

	it('should note when the REPLACE text is already present', () => {
		const feedback = buildRoundFeedback([failed('a.py', 'no-match', { search: 'x = 1', replace: 'x = 2' }, 'x = 2\n')]);

		expect(feedback).to.contain('NOTE: The REPLACE lines are already present in a.py. Consider if this edit is needed.\n');
	});

	it('should use a longer fence when the snapshot contains a code fence', () => {
		const feedback = buildRoundFeedback([failed('README.md', 'no-match', {}, '# Title\n```ts\nconst a = 1;\n```\n')]);

		expect(feedback).to.contain('Current content of README.md:\n````\n# Title\n```ts\nconst a = 1;\n```\n````\n');
	});

	it('should tell the model not to retry safety rejections', () => {
		const feedback = buildRoundFeedback([failed('.env', 'blocked-pattern', { search: '' })]);

		expect(feedback).to.equal(
			'# 1 edit could not be applied\n\n' +
				'## REJECTED edit to .env: blocked-pattern message\n' +
				'This path is not allowed to be written by a safety rule (blocked-pattern). Do not retry edits to it.\n',
		);
	});

	it('should list the applied paths alongside the failures', () => {
		const feedback = buildRoundFeedback([applied('b.py'), failed('a.py', 'file-not-found', {}), failed('c.py', 'declined', {})]);

		expect(feedback.startsWith('Successfully applied changes to: b.py\n\n# 2 edits could not be applied\n\n')).to.be.true;
		expect(feedback).to.contain('## FAILED to apply edit to a.py: file-not-found message\n');
		expect(feedback).to.contain('## DECLINED edit to c.py: the user chose not to apply it. Do not resend it unless asked to.\n');
		expect(feedback.endsWith(`${RETRY_INSTRUCTION}\nThe other edits were applied successfully. Don't resend them.`)).to.be.true;
	});
});
