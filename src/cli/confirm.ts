import * as readline from 'node:readline';
import type { ConfirmEdit, EditConfirmationRequest } from '../swe/coder/editApplier';

async function question(promptText: string): Promise<string> {
	const rl = readline.createInterface({
		input: process.stdin,
		output: process.stdout,
	});

	return new Promise((resolve) => {
		rl.question(promptText, (answer) => {
			rl.close();
			resolve(answer);
		});
	});
}

export function isAccepted(answer: string): boolean {
	const normalised = answer.trim().toLowerCase();
	return normalised === 'y' || normalised === 'yes';
}

/**
 * Shows the diff of each edit on the console and asks whether to apply it.
 * The readline interface is only open while waiting for an answer, so Ctrl+C reaches the process otherwise.
 */
export function consoleConfirm(): ConfirmEdit {
	return async (request: EditConfirmationRequest) => {
		console.log();
		console.log(`${request.kind} ${request.path}`);
		console.log(request.diff || '(no changes)');
		return isAccepted(await question(`Apply this edit to ${request.path}? [y/N] `));
	};
}
