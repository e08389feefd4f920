import fs from 'node:fs/promises';
import path from 'node:path';
import type Pino from 'pino';
import { FileNotFound, NotAllowed } from '../../../shared/errors';
import type { IFileSystemService } from '../../../shared/files/fileSystemService';
import { logger } from '../../o11y/logger';

const MAX_SYMLINKS = 40;

function errorCode(e: unknown): string | undefined {
	return e instanceof Error && 'code' in e && typeof e.code === 'string' ? e.code : undefined;
}

/**
 * Local file system access scoped to a base directory.
 *
 * The FileSystemService is constructed with the basePath property which is like a virtual root.
 * Relative paths are resolved against it, and absolute paths outside it are refused.
 * By default, the basePath is the current working directory of the process.
 */
export class FileSystemService implements IFileSystemService {
	private readonly basePath: string;
	log: Pino.Logger;

	constructor(basePath?: string) {
		this.basePath = path.resolve(basePath ?? process.cwd());
		this.log = logger.child({ FileSystem: this.basePath });
	}

	getWorkingDirectory(): string {
		return this.basePath;
	}

	private resolve(filePath: string): string {
		const resolved = path.isAbsolute(filePath) ? path.normalize(filePath) : path.resolve(this.basePath, filePath);
		const relative = path.relative(this.basePath, resolved);
		if (relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
			this.log.debug({ resolved }, 'Path is outside the base directory. Denying access.');
			throw new NotAllowed(`Path ${filePath} (resolved to ${resolved}) is outside ${this.basePath}`);
		}
		return resolved;
	}

	async fileExists(filePath: string): Promise<boolean> {
		try {
			const stats = await fs.stat(this.resolve(filePath));
			return stats.isFile();
		} catch (e) {
			this.log.debug({ err: e, filePath }, 'fileExists check failed');
			return false;
		}
	}

	async readFile(filePath: string): Promise<string> {
		const resolved = this.resolve(filePath);
		try {
			return await fs.readFile(resolved, 'utf8');
		} catch (e) {
			const code = errorCode(e);
			this.log.debug({ resolved, code }, 'Error during readFile');
			throw new FileNotFound(`File ${filePath} (resolved to ${resolved}) does not exist or cannot be read`, code);
		}
	}

	async writeFile(filePath: string, contents: string): Promise<void> {
		const resolved = this.resolve(filePath);
		this.log.debug(`Writing file "${resolved}" with ${contents.length} chars`);
		await fs.mkdir(path.dirname(resolved), { recursive: true });
		await fs.writeFile(resolved, contents, 'utf8');
	}

	async copyFile(sourcePath: string, destinationPath: string): Promise<void> {
		await fs.copyFile(this.resolve(sourcePath), this.resolve(destinationPath));
	}

	async realPath(filePath: string): Promise<string> {
		let existing = this.resolve(filePath);
		const missing: string[] = [];
		let links = 0;
		while (links <= MAX_SYMLINKS) {
			try {
				return path.join(await fs.realpath(existing), ...missing);
			} catch (e) {
				if (errorCode(e) !== 'ENOENT') throw e;
			}

			// A dangling link is followed to its target
			let isLink = false;
			try {
				isLink = (await fs.lstat(existing)).isSymbolicLink();
			} catch (e) {
				if (errorCode(e) !== 'ENOENT') throw e;
			}
			if (isLink) {
				existing = path.resolve(path.dirname(existing), await fs.readlink(existing));
				links++;
				continue;
			}

			const parent = path.dirname(existing);
			if (parent === existing) return path.join(existing, ...missing);
			missing.unshift(path.basename(existing));
			existing = parent;
		}
		throw new Error(`Too many levels of symbolic links in ${filePath}`);
	}
}
