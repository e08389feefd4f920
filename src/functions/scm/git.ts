import type { VersionControlSystem } from '../../../shared/scm/versionControlSystem';
import { logger } from '../../o11y/logger';
import { arg, execCommand } from '../../utils/exec';

/**
 * Git operations for a working tree, executed with the git CLI.
 */
export class Git implements VersionControlSystem {
	constructor(private readonly workingDirectory: string) {}

	private opts() {
		return { workingDirectory: this.workingDirectory };
	}

	/**
	 * Returns true if the file has staged or unstaged changes relative to HEAD.
	 * Untracked files are reported as dirty too. Outside a repository nothing is dirty.
	 */
	async isDirty(filePath: string): Promise<boolean> {
		const result = await execCommand(`git status --porcelain -- ${arg(filePath)}`, this.opts());
		if (result.exitCode !== 0) {
			logger.debug({ filePath, stderr: result.stderr.trim() }, 'git status failed, treating file as clean');
			return false;
		}
		return result.stdout.trim().length > 0;
	}
}
