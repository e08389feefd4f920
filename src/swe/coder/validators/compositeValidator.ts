import type { EditOperation } from '../coderTypes';
import type { ValidationIssue, ValidationRule } from './validationRule';

/**
 * Checks an edit operation against each rule in order.
 * @returns The issue from the first rule that rejects the operation, or null when every rule passes.
 */
export function validateOperation(op: EditOperation, projectRoot: string, rules: ValidationRule[]): ValidationIssue | null {
	for (const rule of rules) {
		const issue = rule.check(op, projectRoot);
		if (issue) return issue;
	}
	return null;
}
