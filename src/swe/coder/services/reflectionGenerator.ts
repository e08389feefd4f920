import { type ApplyOutcome, type FailedOutcome, editKind, isSafetyRejection } from '../coderTypes';
import { formatEditBlock } from '../editBlockParser';
import { fenceFor } from '../patchUtils';

export const RETRY_INSTRUCTION = 'Please retry the failed edits with corrected SEARCH content that exactly matches the current file content shown above.';

function describeFailure(outcome: FailedOutcome): string {
	if (isSafetyRejection(outcome.reason)) {
		return `## REJECTED edit to ${outcome.path}: ${outcome.message}\nThis path is not allowed to be written by a safety rule (${outcome.reason}). Do not retry edits to it.\n`;
	}
	if (outcome.reason === 'declined') {
		return `## DECLINED edit to ${outcome.path}: the user chose not to apply it. Do not resend it unless asked to.\n`;
	}

	let report = `## FAILED to apply edit to ${outcome.path}: ${outcome.message}\n`;
	const kind = editKind(outcome.operation);
	if (kind === 'modify' || kind === 'delete') {
		report += `${formatEditBlock(outcome.operation)}\n`;
	}
	if (outcome.snapshot !== undefined) {
		const fence = fenceFor(outcome.snapshot);
		const body = outcome.snapshot.endsWith('\n') ? outcome.snapshot : `${outcome.snapshot}\n`;
		report += `Current content of ${outcome.path}:\n${fence}\n${body}${fence}\n`;
		if (outcome.reason === 'no-match' && outcome.operation.replace && outcome.snapshot.includes(outcome.operation.replace)) {
			report += `NOTE: The REPLACE lines are already present in ${outcome.path}. Consider if this edit is needed.\n`;
		}
	}
	return report;
}

/**
 * Builds the message reporting a round's edit outcomes back to the model.
 * Applied edits are only listed by path. Each failure is described with the current content of its file,
 * so the model can correct its SEARCH sections in the next round.
 */
export function buildRoundFeedback(outcomes: readonly ApplyOutcome[]): string {
	const sections: string[] = [];

	const appliedPaths = [...new Set(outcomes.filter((outcome) => outcome.status === 'applied').map((outcome) => outcome.path))];
	if (appliedPaths.length) sections.push(`Successfully applied changes to: ${appliedPaths.join(', ')}`);

	const failures = outcomes.filter((outcome): outcome is FailedOutcome => outcome.status === 'failed');
	if (failures.length) {
		const edits = failures.length === 1 ? 'edit' : 'edits';
		sections.push(`# ${failures.length} ${edits} could not be applied\n\n${failures.map(describeFailure).join('\n')}`);

		if (failures.some((failure) => !isSafetyRejection(failure.reason) && failure.reason !== 'declined')) {
			let instruction = RETRY_INSTRUCTION;
			if (appliedPaths.length) instruction += "\nThe other edits were applied successfully. Don't resend them.";
			sections.push(instruction);
		}
	} else {
		sections.push('Continue with any remaining changes. Reply without edit blocks when the task is complete.');
	}

	return sections.join('\n\n');
}
