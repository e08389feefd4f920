import * as micromatch from 'micromatch';
import type { EditOperation } from '../coderTypes';
import type { ValidationIssue, ValidationRule } from './validationRule';

/** Credential-like files which are never written unless the configuration replaces this list */
export const DEFAULT_BLOCKED_WRITE_PATTERNS: readonly string[] = [
	'.env',
	'.env.*',
	'*.pem',
	'*.key',
	'*.p12',
	'*.pfx',
	'*.jks',
	'*.keystore',
	'id_rsa*',
	'id_dsa*',
	'id_ecdsa*',
	'id_ed25519*',
	'.npmrc',
	'.netrc',
	'.pypirc',
	'*.secret*',
	'.git/**',
];

function toPosix(filePath: string): string {
	return filePath.trim().replace(/\\/g, '/').replace(/^(\.\/)+/, '');
}

/** The part of a pattern to match against the file name alone, for `name` and `**\/name` patterns */
function fileNamePattern(pattern: string): string | null {
	const name = pattern.startsWith('**/') ? pattern.slice(3) : pattern;
	return name.includes('/') ? null : name;
}

/**
 * Rejects writes to paths matching the blocked glob patterns, in every apply mode.
 * A pattern is checked against the whole relative path. Patterns without a directory part are also
 * checked against the file name, so `**\/*.pem` and `*.pem` both block `certs/server.pem`.
 */
export class BlockedPatternRule implements ValidationRule {
	readonly name = 'BlockedPatternRule';

	constructor(private readonly patterns: readonly string[] = DEFAULT_BLOCKED_WRITE_PATTERNS) {}

	check(op: EditOperation): ValidationIssue | null {
		const filePath = toPosix(op.path);
		const fileName = filePath.split('/').pop() ?? filePath;

		for (const pattern of this.patterns) {
			const namePattern = fileNamePattern(pattern);
			const blocked = micromatch.isMatch(filePath, pattern, { dot: true }) || (namePattern !== null && micromatch.isMatch(fileName, namePattern, { dot: true }));
			if (blocked) {
				return { file: op.path, reason: 'blocked-pattern', message: `Writing to ${op.path} is blocked by the pattern ${pattern}` };
			}
		}
		return null;
	}
}
