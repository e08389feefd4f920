import * as path from 'node:path';
import type { EditOperation } from '../coderTypes';
import type { ValidationIssue, ValidationRule } from './validationRule';

/**
 * Rejects paths which do not resolve to a file inside the project root.
 * The check is lexical. Absolute paths and any `..` segment are refused outright.
 */
export class PathContainmentRule implements ValidationRule {
	readonly name = 'PathContainmentRule';

	check(op: EditOperation, projectRoot: string): ValidationIssue | null {
		const filePath = op.path.trim();
		const reject = (message: string): ValidationIssue => ({ file: op.path, reason: 'path-rejected', message });

		if (filePath === '') return reject('The file path is empty');
		if (filePath.includes('\0')) return reject(`The file path ${op.path} contains a null byte`);
		if (path.posix.isAbsolute(filePath) || path.win32.isAbsolute(filePath)) return reject(`Absolute paths are not allowed: ${op.path}`);
		if (filePath.split(/[\\/]/).includes('..')) return reject(`Path traversal is not allowed: ${op.path}`);

		const root = path.resolve(projectRoot);
		const relative = path.relative(root, path.resolve(root, filePath));
		if (relative === '') return reject(`${op.path} resolves to the project root`);
		if (relative.startsWith('..') || path.isAbsolute(relative)) return reject(`${op.path} resolves outside the project root`);
		return null;
	}
}
