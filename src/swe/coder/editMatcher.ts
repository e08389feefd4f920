import { logger } from '../../o11y/logger';
import { MATCH_TIERS, type MatchResult, type MatchTier } from './coderTypes';
import { SNAPSHOT_MAX_LINES } from './constants';

export interface TextRange {
	start: number;
	end: number;
}

type TierMatcher = (content: string, search: string) => TextRange | null;

/**
 * The matcher for each tier. Kept on an object so the tiers can be observed in tests.
 * Later tiers are only called when the earlier ones fail.
 */
export const tierMatchers: Record<MatchTier, TierMatcher> = {
	exact: (content, search) => {
		const start = content.indexOf(search);
		return start === -1 ? null : { start, end: start + search.length };
	},
	whitespace: (content, search) => normalizedMatch(content, search, (line) => line.trimEnd()),
	indent: (content, search) => normalizedMatch(content, search, (line) => line.trim()),
};

/**
 * Locates the region of the file content the search text refers to.
 * Offsets are always into the original content, whichever tier matched.
 * An empty search never matches, creating files is handled by the caller.
 */
export function findSearchText(content: string, search: string): MatchResult {
	const attemptedTiers: MatchTier[] = [];
	if (search !== '') {
		for (const tier of MATCH_TIERS) {
			attemptedTiers.push(tier);
			const range = tierMatchers[tier](content, search);
			if (range) {
				if (tier !== 'exact') logger.debug(`SEARCH text matched with ${tier} normalization`);
				return { found: true, tier, startOffset: range.start, endOffset: range.end };
			}
		}
	}
	return { found: false, attemptedTiers, fileSnapshot: truncateSnapshot(content) };
}

/** The first lines of a file, as included in failure feedback */
export function truncateSnapshot(content: string, maxLines = SNAPSHOT_MAX_LINES): string {
	const lines = content.split('\n');
	if (lines.length <= maxLines) return content;
	return `${lines.slice(0, maxLines).join('\n')}\n... (${lines.length - maxLines} more lines not shown)`;
}

interface NormalizedText {
	text: string;
	/** Original offset of each normalized character, plus one entry for the end of the text */
	offsets: number[];
	/** Line number of each normalized character, plus one entry for the end of the text */
	lineOf: number[];
	/** Original [start, end) of each line, excluding the line break */
	lines: TextRange[];
}

function normalize(content: string, normalizeLine: (line: string) => string): NormalizedText {
	let text = '';
	const offsets: number[] = [];
	const lineOf: number[] = [];
	const lines: TextRange[] = [];

	let lineStart = 0;
	content.split('\n').forEach((line, lineNo) => {
		if (lineNo > 0) {
			// the line break ending the previous line
			text += '\n';
			offsets.push(lineStart - 1);
			lineOf.push(lineNo - 1);
		}
		const normalized = normalizeLine(line);
		const leading = normalized === '' ? 0 : line.indexOf(normalized);
		for (let i = 0; i < normalized.length; i++) {
			offsets.push(lineStart + leading + i);
			lineOf.push(lineNo);
		}
		text += normalized;
		lines.push({ start: lineStart, end: lineStart + line.length });
		lineStart += line.length + 1;
	});
	offsets.push(content.length);
	lineOf.push(lines.length - 1);
	return { text, offsets, lineOf, lines };
}

/**
 * Matches after normalizing every line of both texts, then maps the match back to the original content.
 * A match beginning at a line start, or ending at a line end, is widened to cover the whole original
 * line edge, so the whitespace removed by normalization is part of the replaced region.
 */
function normalizedMatch(content: string, search: string, normalizeLine: (line: string) => string): TextRange | null {
	const normalizedSearch = search.split('\n').map(normalizeLine).join('\n');
	if (normalizedSearch.trim() === '') return null;

	const normalized = normalize(content, normalizeLine);
	const nStart = normalized.text.indexOf(normalizedSearch);
	if (nStart === -1) return null;
	const nEnd = nStart + normalizedSearch.length;

	let start = normalized.offsets[nStart];
	let end = normalized.offsets[nEnd - 1] + 1;

	if (nStart === 0 || normalized.text[nStart - 1] === '\n') {
		start = normalized.lines[normalized.lineOf[nStart]].start;
	}
	if (nEnd === normalized.text.length || normalized.text[nEnd] === '\n') {
		end = Math.max(end, normalized.lines[normalized.lineOf[nEnd]].end);
	}
	return { start, end };
}
