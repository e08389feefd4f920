import { expect } from 'chai';
import * as sinon from 'sinon';
import { setupConditionalLoggerOutput } from '../../test/testUtils';
import type { MatchResult } from './coderTypes';
import { findSearchText, tierMatchers, truncateSnapshot } from './editMatcher';

function matchedText(content: string, result: MatchResult): string {
	if (!result.found) throw new Error('Expected a match');
	return content.slice(result.startOffset, result.endOffset);
}

describe('findSearchText', () => {
	setupConditionalLoggerOutput();

	afterEach(() => sinon.restore());

	describe('exact tier', () => {
		it('should find an exact substring', () => {
			const content = 'x = 1\ny = 2\n';
			const result = findSearchText(content, 'y = 2');

			expect(result).to.deep.equal({ found: true, tier: 'exact', startOffset: 6, endOffset: 11 });
		});

		it('should not evaluate the later tiers when the exact match succeeds', () => {
			const whitespace = sinon.spy(tierMatchers, 'whitespace');
			const indent = sinon.spy(tierMatchers, 'indent');

			for (const [content, search] of [
				['a\nb\n', 'a\nb'],
				['  indented  \n', '  indented'],
				['same same', 'same'],
			]) {
				expect(findSearchText(content, search).found).to.be.true;
			}

			expect(whitespace.called).to.be.false;
			expect(indent.called).to.be.false;
		});

		it('should return the first occurrence', () => {
			const result = findSearchText('a = 1\na = 1\n', 'a = 1');
			expect(result).to.deep.include({ found: true, startOffset: 0, endOffset: 5 });
		});
	});

	describe('whitespace tier', () => {
		it('should ignore trailing whitespace and cover the original trailing whitespace', () => {
			const content = 'export const a = 1;   \nexport const b = 2;\n';
			const result = findSearchText(content, 'export const a = 1;\nexport const b = 2;');

			expect(result).to.deep.equal({ found: true, tier: 'whitespace', startOffset: 0, endOffset: 42 });
		});

		it('should ignore trailing whitespace in the search text', () => {
			const content = 'first\nsecond\nthird\n';
			const result = findSearchText(content, 'second  \nthird\t');

			expect(result).to.deep.include({ found: true, tier: 'whitespace' });
			expect(matchedText(content, result)).to.equal('second\nthird');
		});
	});

	describe('indent tier', () => {
		it('should ignore indentation and replace whole original lines', () => {
			const content = 'class A {\n\tfoo() {\n\t\treturn 1;\n\t}\n}\n';
			const result = findSearchText(content, 'foo() {\n  return 1;\n}');

			expect(result).to.deep.equal({ found: true, tier: 'indent', startOffset: 10, endOffset: 33 });
			expect(matchedText(content, result)).to.equal('\tfoo() {\n\t\treturn 1;\n\t}');
		});

		it('should only try the indent tier after the whitespace tier fails', () => {
			const whitespace = sinon.spy(tierMatchers, 'whitespace');
			const indent = sinon.spy(tierMatchers, 'indent');

			findSearchText('    value = 1\n', 'value = 1\nother');

			expect(whitespace.calledOnce).to.be.true;
			expect(indent.calledOnce).to.be.true;
			expect(whitespace.calledBefore(indent)).to.be.true;
		});
	});

	describe('no match', () => {
		it('should report every tier attempted and a snapshot of the content', () => {
			const content = 'x = 1\n';
			expect(findSearchText(content, 'y = 1')).to.deep.equal({ found: false, attemptedTiers: ['exact', 'whitespace', 'indent'], fileSnapshot: content });
		});

		it('should not match an empty search', () => {
			expect(findSearchText('x = 1\n', '')).to.deep.equal({ found: false, attemptedTiers: [], fileSnapshot: 'x = 1\n' });
		});

		it('should not match a blank search after normalization', () => {
			const result = findSearchText('a\n\nb\n', '   \n  ');
			expect(result.found).to.be.false;
		});

		it('should not match text that only differs inside a line', () => {
			expect(findSearchText('const a  = 1;\n', 'const a = 1;').found).to.be.false;
		});
	});
});

describe('truncateSnapshot', () => {
	setupConditionalLoggerOutput();

	it('should keep short content unchanged', () => {
		expect(truncateSnapshot('a\nb\n', 3)).to.equal('a\nb\n');
	});

	it('should keep the first lines of long content', () => {
		expect(truncateSnapshot('1\n2\n3\n4\n5', 2)).to.equal('1\n2\n... (3 more lines not shown)');
	});

	it('should default to 200 lines', () => {
		const content = Array.from({ length: 250 }, (_, i) => `line ${i + 1}`).join('\n');
		const snapshot = truncateSnapshot(content);
		expect(snapshot.split('\n')).to.have.length(201);
		expect(snapshot.endsWith('line 200\n... (50 more lines not shown)')).to.be.true;
	});
});
