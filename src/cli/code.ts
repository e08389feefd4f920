#!/usr/bin/env node
import * as path from 'node:path';
import { config as loadEnv } from 'dotenv';
import { loadEditloopConfig } from '../config/configuration';
import { FileSystemService } from '../functions/storage/fileSystemService';
import { createAiSdkSender, createOpenAiModel } from '../llm/services/aiSdkSender';
import { logger } from '../o11y/logger';
import type { AgentResult, RoundResult } from '../swe/coder/coderTypes';
import { FileEditApplier } from '../swe/coder/editApplier';
import { buildInitialPrompt, buildSystemPrompt } from '../swe/coder/promptBuilder';
import { SearchReplaceOrchestrator } from '../swe/coder/searchReplaceOrchestrator';
import { TokenTracker } from '../swe/coder/tokenTracker';
import { ConfigurationError } from '../swe/sweErrors';
import { envVar } from '../utils/env-var';
import { errorToString } from '../utils/errors';
import { parseCodeArgs } from './cli';
import { consoleConfirm } from './confirm';

function printRound(round: RoundResult, tokenTracker: TokenTracker): void {
	console.log();
	console.log(`Round ${round.round}: ${round.attempted.length} edits (${round.format})`);
	for (const outcome of round.outcomes) {
		if (outcome.status === 'applied') console.log(`  ✓ ${outcome.summary}`);
		else console.log(`  ✗ ${outcome.path}: ${outcome.message}`);
		for (const advisory of outcome.advisories) console.log(`    ! ${advisory}`);
	}
	const tokenMessage = tokenTracker.thresholdMessage();
	if (tokenMessage) console.log(`  ${tokenMessage}`);
}

function printSummary(result: AgentResult): void {
	console.log();
	console.log('━'.repeat(50));
	console.log(`  Rounds:   ${result.rounds.length}`);
	console.log(`  Stopped:  ${result.stopReason}`);
	console.log(`  Applied:  ${result.appliedPaths.length ? result.appliedPaths.join(', ') : 'none'}`);
	console.log(`  Failed:   ${result.failedCount}`);
	if (result.error) console.log(`  Error:    ${result.error.message}`);
	console.log('━'.repeat(50));
}

async function main(): Promise<number> {
	loadEnv();
	const args = parseCodeArgs(process.argv.slice(2));
	const projectRoot = path.resolve(args.projectRoot);
	const config = await loadEditloopConfig(projectRoot, args.overrides);

	const tokenTracker = new TokenTracker({
		contextWindow: config.contextWindow,
		warningThreshold: config.tokenWarningThreshold,
		criticalThreshold: config.tokenCriticalThreshold,
	});
	const apiKey = envVar('OPENAI_API_KEY', '');
	const model = createOpenAiModel({ modelId: config.model, baseUrl: config.baseUrl, apiKey: apiKey || undefined });

	const orchestrator = new SearchReplaceOrchestrator({
		send: createAiSdkSender({ model, tokenTracker }),
		applier: new FileEditApplier({
			createBackups: config.createBackups,
			createExisting: config.createExisting,
			blockedWritePatterns: config.blockedWritePatterns,
			confirm: consoleConfirm(),
		}),
		projectRoot,
		mode: config.applyMode,
		parseOptions: { incompleteBlocks: config.incompleteBlocks, continueSignal: config.continueSignal },
		systemPrompt: buildSystemPrompt(config.continueSignal),
		onRound: (round) => printRound(round, tokenTracker),
	});

	const controller = new AbortController();
	process.once('SIGINT', () => {
		console.log('\nStopping...');
		controller.abort();
	});

	const initialPrompt = await buildInitialPrompt(args.request, args.files, new FileSystemService(projectRoot));
	console.log(`Editing ${projectRoot} with ${config.model} (${config.applyMode}, up to ${config.maxRounds} rounds)`);

	const result = await orchestrator.run(initialPrompt, config.maxRounds, { tokenBudget: tokenTracker, signal: controller.signal });
	printSummary(result);
	return result.stopReason === 'send-failed' ? 1 : 0;
}

main().then(
	(exitCode) => {
		process.exitCode = exitCode;
	},
	(e) => {
		if (e instanceof ConfigurationError) logger.error({ err: e, source: e.source }, 'Invalid configuration');
		else logger.error({ err: e }, 'editloop failed');
		console.error(errorToString(e));
		process.exitCode = 1;
	},
);
