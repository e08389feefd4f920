import { logger } from '../../o11y/logger';
import type { EditFormat, EditOperation, IncompleteBlockPolicy, ParseOptions, ParsedResponse } from './coderTypes';
import { DEFAULT_CONTINUE_SIGNAL, DIVIDER_MARKER, REPLACE_MARKER, SEARCH_MARKER } from './constants';

/** Returned by a fallback parser when the response is not in its format */
export const NO_MATCH = Symbol('NO_MATCH');

type FallbackParser = (text: string) => EditOperation[] | typeof NO_MATCH;

/** Legacy whole-file formats, in priority order. Only tried when no SEARCH/REPLACE block was found. */
const FALLBACK_PARSERS: ReadonlyArray<{ format: EditFormat; parse: FallbackParser }> = [
	{ format: 'fenced-file', parse: parseFencedFileBlocks },
	{ format: 'unified-diff', parse: parseUnifiedDiff },
	{ format: 'file-marker', parse: parseFileMarkers },
];

/**
 * Extracts the edit operations from a model response.
 * SEARCH/REPLACE blocks are the primary format. The fallback formats are only considered when
 * the response contains no complete SEARCH/REPLACE block, and at most one of them is used.
 */
export function parseEditResponse(text: string, options: ParseOptions = {}): ParsedResponse {
	const lines = text.split(/\r?\n/);
	const { edits, warnings, continueRequested } = parseSearchReplaceBlocks(
		lines,
		options.incompleteBlocks ?? 'drop',
		options.continueSignal ?? DEFAULT_CONTINUE_SIGNAL,
	);
	if (edits.length > 0) {
		logger.debug(`Parsed ${edits.length} SEARCH/REPLACE blocks`);
		return { edits, format: 'search-replace', continueRequested, warnings };
	}

	for (const fallback of FALLBACK_PARSERS) {
		const result = fallback.parse(text);
		if (result === NO_MATCH) continue;
		logger.info(`No SEARCH/REPLACE blocks found. Parsed ${result.length} edits in the ${fallback.format} format`);
		return { edits: result, format: fallback.format, continueRequested, warnings };
	}

	return { edits: [], format: 'none', continueRequested, warnings };
}

type ParserState = 'scanning' | 'in-search' | 'in-replace';

/** Markers must match exactly. A lone carriage return left by mixed line endings is the only tolerance */
function withoutCr(line: string): string {
	return line.endsWith('\r') ? line.slice(0, -1) : line;
}

function isMarker(line: string): boolean {
	const bare = withoutCr(line);
	return bare === SEARCH_MARKER || bare === DIVIDER_MARKER || bare === REPLACE_MARKER;
}

function isSearchMarker(line: string | undefined): boolean {
	return line !== undefined && withoutCr(line) === SEARCH_MARKER;
}

/** A path line is only recognised directly above a SEARCH marker, so prose is never taken for a path */
function isPathCandidate(line: string, nextLine: string | undefined): boolean {
	if (line.trim() === '' || line.startsWith(' ') || line.startsWith('\t')) return false;
	if (isMarker(line)) return false;
	return isSearchMarker(nextLine);
}

interface BlockScan {
	edits: EditOperation[];
	warnings: string[];
	continueRequested: boolean;
}

function parseSearchReplaceBlocks(lines: string[], policy: IncompleteBlockPolicy, continueSignal: string): BlockScan {
	const edits: EditOperation[] = [];
	const warnings: string[] = [];
	let continueRequested = false;

	let state: ParserState = 'scanning';
	let path = '';
	let searchLines: string[] = [];
	let replaceLines: string[] = [];

	const dropIncomplete = (missing: string) => {
		if (policy !== 'warn') return;
		const warning = `Dropped incomplete edit block for ${path}: missing ${missing}`;
		warnings.push(warning);
		logger.warn(warning);
	};

	let i = 0;
	while (i < lines.length) {
		const line = lines[i];
		const nextLine = lines[i + 1];

		if (state !== 'scanning') {
			// The first line of a section is content even when a SEARCH marker follows it
			const sectionHasContent = state === 'in-search' ? searchLines.length > 0 : replaceLines.length > 0;
			const startsNewBlock = sectionHasContent && isPathCandidate(line, nextLine);
			if (startsNewBlock || isSearchMarker(line)) {
				dropIncomplete(state === 'in-search' ? DIVIDER_MARKER : REPLACE_MARKER);
				state = 'scanning';
				if (!startsNewBlock) {
					i++;
					continue;
				}
			}
		}

		switch (state) {
			case 'scanning':
				if (isPathCandidate(line, nextLine)) {
					path = line.trimEnd();
					searchLines = [];
					replaceLines = [];
					state = 'in-search';
					i++; // consume the SEARCH marker
				} else if (line.trim() === continueSignal) {
					continueRequested = true;
				}
				break;
			case 'in-search':
				if (withoutCr(line) === DIVIDER_MARKER) state = 'in-replace';
				else searchLines.push(line);
				break;
			case 'in-replace':
				if (withoutCr(line) === REPLACE_MARKER) {
					edits.push({ path, search: searchLines.join('\n'), replace: replaceLines.join('\n'), granularity: 'region' });
					state = 'scanning';
				} else {
					replaceLines.push(line);
				}
				break;
		}
		i++;
	}

	if (state !== 'scanning') dropIncomplete(state === 'in-search' ? DIVIDER_MARKER : REPLACE_MARKER);

	return { edits, warnings, continueRequested };
}

/**
 * Formats an operation in the format it would be parsed from.
 * For a well-formed SEARCH/REPLACE block the output is identical to the parsed input.
 */
export function formatEditBlock(op: EditOperation): string {
	switch (op.granularity) {
		case 'file':
			return `FILE: ${op.path}\n${op.replace}`;
		case 'patch':
			return `--- a/${op.path}\n+++ b/${op.path}\n${op.replace}\n`;
		case 'region': {
			const search = op.search === '' ? '' : `${op.search}\n`;
			const replace = op.replace === '' ? '' : `${op.replace}\n`;
			return `${op.path}\n${SEARCH_MARKER}\n${search}${DIVIDER_MARKER}\n${replace}${REPLACE_MARKER}\n`;
		}
	}
}

/* ------------------------------------------------------------------------------------------
 * Fallback formats. Each operation replaces or patches the whole file.
 * ----------------------------------------------------------------------------------------*/

/** ```lang:path fences. The fence content is the new file content */
function parseFencedFileBlocks(text: string): EditOperation[] | typeof NO_MATCH {
	const edits: EditOperation[] = [];
	const fenceRegex = /```[\w+#.-]+:([^\n]+)\n([\s\S]*?)```/g;
	for (const match of text.matchAll(fenceRegex)) {
		const path = match[1].trim();
		if (!path) continue;
		edits.push({ path, search: '', replace: match[2], granularity: 'file' });
	}
	return edits.length ? edits : NO_MATCH;
}

const HUNK_HEADER_REGEX = /^@@ -\d+(?:,\d+)? \+\d+(?:,\d+)? @@/;

function diffPath(headerLine: string, prefix: '--- ' | '+++ '): string | null {
	let path = headerLine.slice(prefix.length).split('\t')[0].trim();
	if (path === '/dev/null') return null;
	if (path.startsWith('a/') || path.startsWith('b/')) path = path.slice(2);
	return path;
}

/** `--- a/path` / `+++ b/path` headers followed by @@ hunks. The hunks are kept as the patch text */
function parseUnifiedDiff(text: string): EditOperation[] | typeof NO_MATCH {
	const lines = text.split(/\r?\n/);
	const edits: EditOperation[] = [];

	let i = 0;
	while (i < lines.length) {
		if (!lines[i].startsWith('--- ') || !lines[i + 1]?.startsWith('+++ ')) {
			i++;
			continue;
		}
		const path = diffPath(lines[i + 1], '+++ ') ?? diffPath(lines[i], '--- ');
		i += 2;

		const hunkLines: string[] = [];
		while (i < lines.length && !(lines[i].startsWith('--- ') && lines[i + 1]?.startsWith('+++ '))) {
			const line = lines[i];
			if (HUNK_HEADER_REGEX.test(line) || (hunkLines.length > 0 && /^[ +\-\\]/.test(line)) || (hunkLines.length > 0 && line === '')) {
				hunkLines.push(line);
			} else if (hunkLines.length > 0) {
				break;
			}
			i++;
		}
		while (hunkLines.length && hunkLines[hunkLines.length - 1] === '') hunkLines.pop();

		if (!path || hunkLines.length === 0) {
			logger.warn(`Skipping unified diff section without a target path or hunks: ${path ?? '/dev/null'}`);
			continue;
		}
		edits.push({ path, search: '', replace: hunkLines.join('\n'), granularity: 'patch' });
	}
	return edits.length ? edits : NO_MATCH;
}

/** `FILE: path` lines, each followed by the full file content up to the next FILE: line */
function parseFileMarkers(text: string): EditOperation[] | typeof NO_MATCH {
	const edits: EditOperation[] = [];
	const markerRegex = /(?:^|\n)FILE:[ \t]*([^\n]+)\n([\s\S]*?)(?=\nFILE:\s|$)/g;
	for (const match of text.replace(/\r\n/g, '\n').matchAll(markerRegex)) {
		const path = match[1].trim();
		if (!path) continue;
		const content = match[2].trim();
		edits.push({ path, search: '', replace: content ? `${content}\n` : '', granularity: 'file' });
	}
	return edits.length ? edits : NO_MATCH;
}
