import * as path from 'node:path';
import type { IFileSystemService } from '../../../shared/files/fileSystemService';
import { logger } from '../../o11y/logger';
import { errorToString } from '../../utils/errors';
import { DEFAULT_CONTINUE_SIGNAL } from './constants';
import { fenceFor } from './patchUtils';
import { EDIT_BLOCK_PROMPTS } from './searchReplacePrompts';

export function buildSystemPrompt(continueSignal: string = DEFAULT_CONTINUE_SIGNAL): string {
	const main = EDIT_BLOCK_PROMPTS.main_system.replace('{continue_signal}', continueSignal);
	return `${main}\n\n# Example\n\n${EDIT_BLOCK_PROMPTS.example}\n\n${EDIT_BLOCK_PROMPTS.system_reminder}`;
}

export async function formatFileForPrompt(relativePath: string, fs: IFileSystemService): Promise<string> {
	let content: string;
	try {
		content = await fs.readFile(relativePath);
	} catch (e) {
		logger.warn(`Could not read ${relativePath} for the prompt: ${errorToString(e)}`);
		return `${relativePath}\n[Could not read file content]`;
	}
	const lang = path.extname(relativePath).substring(1) || 'text';
	const fence = fenceFor(content);
	const body = content.endsWith('\n') || content === '' ? content : `${content}\n`;
	return `${relativePath}\n${fence}${lang}\n${body}${fence}`;
}

/**
 * The first message of a run: the contents of the files to edit followed by the user's request.
 * @param files Paths relative to the working directory of the file system
 */
export async function buildInitialPrompt(request: string, files: readonly string[], fs: IFileSystemService): Promise<string> {
	let filesBlock: string = EDIT_BLOCK_PROMPTS.files_no_full_files;
	if (files.length) {
		filesBlock = EDIT_BLOCK_PROMPTS.files_content_prefix;
		for (const file of files) {
			filesBlock += `\n${await formatFileForPrompt(file, fs)}\n`;
		}
	}
	return `${filesBlock}\n${request.trim()}`;
}
