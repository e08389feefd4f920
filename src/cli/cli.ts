import { Command, InvalidArgumentError } from 'commander';
import type { EditloopConfig } from '../config/configuration';

export class CliArgumentError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'CliArgumentError';
		Object.setPrototypeOf(this, CliArgumentError.prototype);
	}
}

export interface CodeCliOptions {
	request: string;
	/** Files whose content is included in the first message, relative to the project root */
	files: string[];
	projectRoot: string;
	/** Settings given on the command line, which take precedence over the config file and environment */
	overrides: Partial<EditloopConfig>;
}

interface CommandOptions {
	files?: string[];
	maxRounds?: number;
	autoApply?: boolean;
	dryRun?: boolean;
	backup: boolean;
	model?: string;
	baseUrl?: string;
	project?: string;
}

function parsePositiveInteger(value: string): number {
	const parsed = Number(value);
	if (!Number.isInteger(parsed) || parsed < 1) throw new InvalidArgumentError('Must be a positive integer.');
	return parsed;
}

export function createCodeCommand(): Command {
	return new Command()
		.name('editloop')
		.description('Edit the files of a project with a language model, over multiple rounds of SEARCH/REPLACE edits')
		.argument('<request...>', 'what to change')
		.option('-f, --files <paths...>', 'files to include in the first message')
		.option('-m, --max-rounds <n>', 'maximum number of rounds', parsePositiveInteger)
		.option('--auto-apply', 'write edits without asking')
		.option('--dry-run', 'report the edits without writing them')
		.option('--no-backup', 'do not create .bak copies of edited files')
		.option('--model <id>', 'model id')
		.option('--base-url <url>', 'base URL of an OpenAI compatible API')
		.option('-C, --project <dir>', 'project root directory, defaults to the working directory');
}

/**
 * Parses the arguments of the editloop command, excluding the node and script paths.
 * Commander errors are thrown rather than exiting the process.
 */
export function parseCodeArgs(args: string[], command: Command = createCodeCommand()): CodeCliOptions {
	command.exitOverride();
	command.parse(args, { from: 'user' });
	const options = command.opts<CommandOptions>();

	if (options.autoApply && options.dryRun) throw new CliArgumentError('--auto-apply and --dry-run cannot be used together');
	const request = command.args.join(' ').trim();
	if (!request) throw new CliArgumentError('The request is empty');

	const overrides: Partial<EditloopConfig> = {};
	if (options.maxRounds !== undefined) overrides.maxRounds = options.maxRounds;
	if (options.autoApply) overrides.applyMode = 'auto-apply';
	if (options.dryRun) overrides.applyMode = 'dry-run';
	if (!options.backup) overrides.createBackups = false;
	if (options.model) overrides.model = options.model;
	if (options.baseUrl) overrides.baseUrl = options.baseUrl;

	return {
		request,
		files: options.files ?? [],
		projectRoot: options.project ?? process.cwd(),
		overrides,
	};
}
