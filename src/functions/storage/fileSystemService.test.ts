import { readFileSync } from 'node:fs';
import chai from 'chai';
import chaiAsPromised from 'chai-as-promised';
import mockFs from 'mock-fs';
import { FileNotFound, NotAllowed } from '../../../shared/errors';
import { setupConditionalLoggerOutput } from '../../test/testUtils';
import { FileSystemService } from './fileSystemService';

chai.use(chaiAsPromised);
const { expect } = chai;

describe('FileSystemService', () => {
	setupConditionalLoggerOutput();

	let fss: FileSystemService;

	beforeEach(() => {
		mockFs({
			'/project': {
				'a.txt': 'alpha\n',
				src: {},
				'link.txt': mockFs.symlink({ path: 'a.txt' }),
				lib: mockFs.symlink({ path: '/shared' }),
			},
			'/shared': {},
			'/outside.txt': 'secret',
		});
		fss = new FileSystemService('/project');
	});

	afterEach(() => mockFs.restore());

	it('should resolve relative paths against the base path', async () => {
		expect(fss.getWorkingDirectory()).to.equal('/project');
		expect(await fss.readFile('a.txt')).to.equal('alpha\n');
		expect(await fss.readFile('/project/a.txt')).to.equal('alpha\n');
	});

	it('should only report regular files as existing', async () => {
		expect(await fss.fileExists('a.txt')).to.be.true;
		expect(await fss.fileExists('src')).to.be.false;
		expect(await fss.fileExists('missing.txt')).to.be.false;
		expect(await fss.fileExists('../outside.txt')).to.be.false;
	});

	it('should throw FileNotFound for a missing file', async () => {
		await expect(fss.readFile('missing.txt')).to.be.rejectedWith(FileNotFound);
	});

	it('should refuse paths outside the base path', async () => {
		await expect(fss.readFile('../outside.txt')).to.be.rejectedWith(NotAllowed);
		await expect(fss.writeFile('/outside.txt', 'changed')).to.be.rejectedWith(NotAllowed);
		expect(readFileSync('/outside.txt', 'utf8')).to.equal('secret');
	});

	it('should create missing parent directories when writing', async () => {
		await fss.writeFile('src/deep/new.ts', 'export {};\n');

		expect(readFileSync('/project/src/deep/new.ts', 'utf8')).to.equal('export {};\n');
	});

	it('should copy a file', async () => {
		await fss.copyFile('a.txt', 'a.txt.bak');

		expect(readFileSync('/project/a.txt.bak', 'utf8')).to.equal('alpha\n');
	});

	it('should resolve the symbolic links of a path', async () => {
		expect(await fss.realPath('.')).to.equal('/project');
		expect(await fss.realPath('link.txt')).to.equal('/project/a.txt');
		expect(await fss.realPath('lib/util.ts')).to.equal('/shared/util.ts');
	});

	it('should join the missing segments of a new path to its nearest existing parent', async () => {
		expect(await fss.realPath('src/deep/new.ts')).to.equal('/project/src/deep/new.ts');
	});
});
