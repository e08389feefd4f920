import { expect } from 'chai';
import { setupConditionalLoggerOutput } from '../../../test/testUtils';
import type { EditOperation } from '../coderTypes';
import { BlockedPatternRule } from './blockedPatternRule';

describe('BlockedPatternRule', () => {
	setupConditionalLoggerOutput();

	const op = (path: string): EditOperation => ({ path, search: '', replace: 'content', granularity: 'region' });

	describe('default patterns', () => {
		const rule = new BlockedPatternRule();

		it('should block .env files at any depth', () => {
			expect(rule.check(op('.env'))?.reason).to.equal('blocked-pattern');
			expect(rule.check(op('config/.env'))?.reason).to.equal('blocked-pattern');
			expect(rule.check(op('.env.production'))?.message).to.equal('Writing to .env.production is blocked by the pattern .env.*');
		});

		it('should block keys and certificates', () => {
			expect(rule.check(op('certs/server.pem'))?.message).to.equal('Writing to certs/server.pem is blocked by the pattern *.pem');
			expect(rule.check(op('private.key'))?.reason).to.equal('blocked-pattern');
			expect(rule.check(op('.ssh/id_rsa.pub'))?.reason).to.equal('blocked-pattern');
		});

		it('should block writes inside the .git directory', () => {
			expect(rule.check(op('.git/config'))?.message).to.equal('Writing to .git/config is blocked by the pattern .git/**');
		});

		it('should allow ordinary source files', () => {
			expect(rule.check(op('src/environment.ts'))).to.be.null;
			expect(rule.check(op('docs/keys.md'))).to.be.null;
			expect(rule.check(op('config.json'))).to.be.null;
		});
	});

	describe('configured patterns', () => {
		const rule = new BlockedPatternRule(['**/.env', '**/*.secret*', 'deploy/*.yaml']);

		it('should match ** patterns against the file name', () => {
			expect(rule.check(op('.env'))?.message).to.equal('Writing to .env is blocked by the pattern **/.env');
			expect(rule.check(op('a/b/db.secret.json'))?.reason).to.equal('blocked-pattern');
		});

		it('should normalise windows separators', () => {
			expect(rule.check(op('deploy\\prod.yaml'))?.message).to.equal('Writing to deploy\\prod.yaml is blocked by the pattern deploy/*.yaml');
		});

		it('should only match patterns with a directory part against the whole path', () => {
			expect(rule.check(op('config.yaml'))).to.be.null;
			expect(rule.check(op('other/prod.yaml'))).to.be.null;
		});

		it('should not apply the default list', () => {
			expect(rule.check(op('server.pem'))).to.be.null;
		});
	});
});
