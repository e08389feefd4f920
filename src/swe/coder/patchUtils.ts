import { PatchApplyError } from '../sweErrors';

const DIFF_CONTEXT_LINES = 3;
const HUNK_HEADER_REGEX = /^@@ -(\d+)(?:,(\d+))? \+(\d+)(?:,(\d+))? @@/;

/**
 * Splits content into lines. A trailing line break does not produce an extra empty line.
 */
export function splitLines(content: string): string[] {
	if (content === '') return [];
	const lines = content.split('\n');
	if (lines[lines.length - 1] === '') lines.pop();
	return lines;
}

/** A markdown fence longer than any backtick run in the content */
export function fenceFor(content: string): string {
	const longest = Math.max(2, ...(content.match(/`+/g) ?? []).map((run) => run.length));
	return '`'.repeat(longest + 1);
}

export function replaceRange(content: string, start: number, end: number, replacement: string): string {
	return content.slice(0, start) + replacement + content.slice(end);
}

export interface RegionDiff {
	/** Unified diff text, empty when the contents are equal */
	diff: string;
	added: number;
	removed: number;
}

function hunkRange(start: number, length: number): string {
	return `${length === 0 ? start : start + 1},${length}`;
}

/**
 * Builds a unified diff of a single changed region, as produced by one edit operation.
 * The changed lines are those between the common leading and trailing lines of both contents.
 * @param before The previous content, or null when the file is being created
 */
export function formatRegionDiff(path: string, before: string | null, after: string): RegionDiff {
	const oldLines = splitLines(before ?? '');
	const newLines = splitLines(after);

	let prefix = 0;
	while (prefix < oldLines.length && prefix < newLines.length && oldLines[prefix] === newLines[prefix]) prefix++;
	let suffix = 0;
	while (
		suffix < oldLines.length - prefix &&
		suffix < newLines.length - prefix &&
		oldLines[oldLines.length - 1 - suffix] === newLines[newLines.length - 1 - suffix]
	)
		suffix++;

	const removed = oldLines.slice(prefix, oldLines.length - suffix);
	const added = newLines.slice(prefix, newLines.length - suffix);
	if (removed.length === 0 && added.length === 0) return { diff: '', added: 0, removed: 0 };

	const contextStart = Math.max(0, prefix - DIFF_CONTEXT_LINES);
	const leading = oldLines.slice(contextStart, prefix);
	const trailing = oldLines.slice(oldLines.length - suffix, Math.min(oldLines.length, oldLines.length - suffix + DIFF_CONTEXT_LINES));

	const oldLength = leading.length + removed.length + trailing.length;
	const newLength = leading.length + added.length + trailing.length;
	const diff = [
		before === null ? '--- /dev/null' : `--- a/${path}`,
		`+++ b/${path}`,
		`@@ -${hunkRange(contextStart, oldLength)} +${hunkRange(contextStart, newLength)} @@`,
		...leading.map((line) => ` ${line}`),
		...removed.map((line) => `-${line}`),
		...added.map((line) => `+${line}`),
		...trailing.map((line) => ` ${line}`),
	].join('\n');

	return { diff, added: added.length, removed: removed.length };
}

interface Hunk {
	header: string;
	oldStart: number;
	oldLength: number;
	lines: string[];
}

function parseHunks(patch: string): Hunk[] {
	const hunks: Hunk[] = [];
	for (const line of patch.split('\n')) {
		const header = HUNK_HEADER_REGEX.exec(line);
		if (header) {
			hunks.push({ header: line, oldStart: Number(header[1]), oldLength: header[2] === undefined ? 1 : Number(header[2]), lines: [] });
			continue;
		}
		const current = hunks[hunks.length - 1];
		if (!current || line.startsWith('\\')) continue;
		current.lines.push(line);
	}
	return hunks;
}

/**
 * Applies unified diff hunks by their line numbers alone. Context lines are taken from the file
 * rather than compared with it, so a patch is applied at the position its header states.
 */
export function applyUnifiedPatch(content: string, patch: string): string {
	const original = splitLines(content);
	const hunks = parseHunks(patch);
	if (hunks.length === 0) throw new PatchApplyError('The patch contains no hunks');

	const result: string[] = [];
	let cursor = 0; // next unconsumed line of the original

	for (const hunk of hunks) {
		// A hunk which removes nothing inserts after its start line
		const hunkStart = hunk.oldLength === 0 ? hunk.oldStart : hunk.oldStart - 1;
		if (hunkStart < cursor || hunkStart > original.length) {
			throw new PatchApplyError(`Hunk ${hunk.header} does not fit the file, which has ${original.length} lines`);
		}
		result.push(...original.slice(cursor, hunkStart));
		cursor = hunkStart;

		for (const line of hunk.lines) {
			const marker = line.charAt(0);
			if (marker === '+') {
				result.push(line.slice(1));
				continue;
			}
			if (cursor >= original.length) {
				throw new PatchApplyError(`Hunk ${hunk.header} extends past the end of the file`);
			}
			if (marker === '-') {
				cursor++;
			} else {
				result.push(original[cursor]);
				cursor++;
			}
		}
	}
	result.push(...original.slice(cursor));

	if (result.length === 0) return '';
	const trailingNewline = content === '' || content.endsWith('\n');
	return result.join('\n') + (trailingNewline ? '\n' : '');
}
