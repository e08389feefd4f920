import { type ExecException, type ExecOptions, exec } from 'node:child_process';
import { promisify } from 'node:util';
import { logger } from '../o11y/logger';

const execAsync = promisify(exec);

export interface ExecResult {
	command: string;
	stdout: string;
	stderr: string;
	exitCode: number;
}

export interface ExecCmdOptions {
	workingDirectory?: string;
}

function isExecException(error: unknown): error is ExecException & { stdout?: string; stderr?: string } {
	return error instanceof Error && 'cmd' in error;
}

/**
 * Runs a shell command. A non-zero exit code is returned in the result rather than thrown.
 */
export async function execCommand(command: string, opts?: ExecCmdOptions): Promise<ExecResult> {
	const options: ExecOptions = { cwd: opts?.workingDirectory ?? process.cwd() };
	try {
		logger.debug(`${options.cwd} % ${command}`);
		const { stdout, stderr } = await execAsync(command, { ...options, encoding: 'utf8' });
		return { stdout, stderr, exitCode: 0, command };
	} catch (error) {
		if (!isExecException(error)) throw error;
		const exitCode = typeof error.code === 'number' ? error.code : 1;
		const result: ExecResult = { stdout: error.stdout ?? '', stderr: error.stderr ?? '', exitCode, command };
		logger.debug({ exitCode, stderr: result.stderr }, `Command failed: ${command}`);
		return result;
	}
}

/**
 * Sanitise arguments by single quoting and escaping single quotes in the value
 * @param argValue command line argument value
 */
export function arg(argValue: string): string {
	// Escapes single quotes for POSIX shells (' -> '\''')
	return `'${argValue.replace(/'/g, "'\\''")}'`;
}
