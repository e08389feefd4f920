import { expect } from 'chai';
import { setupConditionalLoggerOutput } from '../../test/testUtils';
import { PatchApplyError } from '../sweErrors';
import { applyUnifiedPatch, fenceFor, formatRegionDiff, splitLines } from './patchUtils';

describe('patchUtils', () => {
	setupConditionalLoggerOutput();

	describe('splitLines', () => {
		it('should not produce an empty line for a trailing line break', () => {
			expect(splitLines('a\nb\n')).to.deep.equal(['a', 'b']);
			expect(splitLines('a\nb')).to.deep.equal(['a', 'b']);
			expect(splitLines('')).to.deep.equal([]);
		});
	});

	describe('fenceFor', () => {
		it('should be longer than any backtick run in the content', () => {
			expect(fenceFor('plain')).to.equal('```');
			expect(fenceFor('```ts\n```')).to.equal('````');
		});
	});

	describe('formatRegionDiff', () => {
		it('should include up to three lines of context', () => {
			const before = 'l1\nl2\nl3\nl4\nl5\nl6\nl7\nl8\n';
			const after = 'l1\nl2\nl3\nl4\nL5\nl6\nl7\nl8\n';

			expect(formatRegionDiff('f.txt', before, after)).to.deep.equal({
				diff: '--- a/f.txt\n+++ b/f.txt\n@@ -2,7 +2,7 @@\n l2\n l3\n l4\n-l5\n+L5\n l6\n l7\n l8',
				added: 1,
				removed: 1,
			});
		});

		it('should count inserted lines', () => {
			const result = formatRegionDiff('f.txt', 'a\nc\n', 'a\nb\nc\n');

			expect(result.diff).to.equal('--- a/f.txt\n+++ b/f.txt\n@@ -1,2 +1,3 @@\n a\n+b\n c');
			expect(result.added).to.equal(1);
			expect(result.removed).to.equal(0);
		});

		it('should return an empty diff for unchanged content', () => {
			expect(formatRegionDiff('f.txt', 'same\n', 'same\n')).to.deep.equal({ diff: '', added: 0, removed: 0 });
		});
	});

	describe('applyUnifiedPatch', () => {
		it('should apply hunks at the positions in their headers', () => {
			const content = 'one\ntwo\nthree\nfour\nfive\n';
			const patch = '@@ -2,1 +2,1 @@\n-two\n+TWO\n@@ -4,2 +4,3 @@\n four\n+four and a half\n five';

			expect(applyUnifiedPatch(content, patch)).to.equal('one\nTWO\nthree\nfour\nfour and a half\nfive\n');
		});

		it('should take context lines from the file without comparing them', () => {
			expect(applyUnifiedPatch('alpha\nbeta\n', '@@ -1,2 +1,2 @@\n something else\n-beta\n+gamma')).to.equal('alpha\ngamma\n');
		});

		it('should create content from an empty file', () => {
			expect(applyUnifiedPatch('', '@@ -0,0 +1,2 @@\n+first\n+second')).to.equal('first\nsecond\n');
		});

		it('should insert after the start line when no lines are removed', () => {
			expect(applyUnifiedPatch('a\nb\n', '@@ -1,0 +2,1 @@\n+inserted')).to.equal('a\ninserted\nb\n');
		});

		it('should keep a missing trailing newline', () => {
			expect(applyUnifiedPatch('a\nb', '@@ -1,1 +1,1 @@\n-a\n+A')).to.equal('A\nb');
		});

		it('should reject hunks beyond the end of the file', () => {
			expect(() => applyUnifiedPatch('a\n', '@@ -5,1 +5,1 @@\n-e\n+E')).to.throw(PatchApplyError, 'does not fit the file, which has 1 lines');
			expect(() => applyUnifiedPatch('a\n', '@@ -1,2 +1,2 @@\n a\n-b\n+B')).to.throw(PatchApplyError, 'extends past the end of the file');
		});

		it('should reject a patch without hunks', () => {
			expect(() => applyUnifiedPatch('a\n', '+b')).to.throw(PatchApplyError, 'The patch contains no hunks');
		});
	});
});
