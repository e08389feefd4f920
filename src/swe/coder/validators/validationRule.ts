import type { EditOperation, FailureReason } from '../coderTypes';

export interface ValidationIssue {
	file: string;
	reason: Extract<FailureReason, 'path-rejected' | 'blocked-pattern'>;
	message: string;
}

/** A safety gate checked for every edit operation before anything is read or written */
export interface ValidationRule {
	name: string;
	check(op: EditOperation, projectRoot: string): ValidationIssue | null;
}
