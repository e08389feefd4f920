import { readFile } from 'node:fs/promises';
import * as path from 'node:path';
import { type Static, Type } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { logger } from '../o11y/logger';
import { DEFAULT_CONTINUE_SIGNAL } from '../swe/coder/constants';
import { DEFAULT_CONTEXT_WINDOW } from '../swe/coder/tokenTracker';
import { DEFAULT_BLOCKED_WRITE_PATTERNS } from '../swe/coder/validators/blockedPatternRule';
import { ConfigurationError } from '../swe/sweErrors';
import { envVar } from '../utils/env-var';
import { errorToString } from '../utils/errors';

export const CONFIG_FILE_NAME = '.editloop.json';

export const EditloopConfigSchema = Type.Object(
	{
		model: Type.String({ minLength: 1 }),
		baseUrl: Type.Optional(Type.String({ minLength: 1 })),
		maxRounds: Type.Integer({ minimum: 1 }),
		applyMode: Type.Union([Type.Literal('confirm'), Type.Literal('auto-apply'), Type.Literal('dry-run')]),
		createBackups: Type.Boolean(),
		blockedWritePatterns: Type.Array(Type.String({ minLength: 1 })),
		createExisting: Type.Union([Type.Literal('append'), Type.Literal('overwrite'), Type.Literal('reject')]),
		incompleteBlocks: Type.Union([Type.Literal('drop'), Type.Literal('warn')]),
		continueSignal: Type.String({ minLength: 1 }),
		contextWindow: Type.Integer({ minimum: 1 }),
		tokenWarningThreshold: Type.Number({ exclusiveMinimum: 0, maximum: 1 }),
		tokenCriticalThreshold: Type.Number({ exclusiveMinimum: 0, maximum: 1 }),
	},
	{ additionalProperties: false },
);

export type EditloopConfig = Static<typeof EditloopConfigSchema>;

export const DEFAULT_CONFIG: EditloopConfig = {
	model: 'gpt-4o',
	maxRounds: 5,
	applyMode: 'confirm',
	createBackups: true,
	blockedWritePatterns: [...DEFAULT_BLOCKED_WRITE_PATTERNS],
	createExisting: 'append',
	incompleteBlocks: 'drop',
	continueSignal: DEFAULT_CONTINUE_SIGNAL,
	contextWindow: DEFAULT_CONTEXT_WINDOW,
	tokenWarningThreshold: 0.8,
	tokenCriticalThreshold: 0.95,
};

type ValueKind = 'string' | 'number' | 'boolean' | 'list';

const ENV_VARS: Record<string, { key: keyof EditloopConfig; kind: ValueKind }> = {
	EDITLOOP_MODEL: { key: 'model', kind: 'string' },
	EDITLOOP_BASE_URL: { key: 'baseUrl', kind: 'string' },
	EDITLOOP_MAX_ROUNDS: { key: 'maxRounds', kind: 'number' },
	EDITLOOP_APPLY_MODE: { key: 'applyMode', kind: 'string' },
	EDITLOOP_CREATE_BACKUPS: { key: 'createBackups', kind: 'boolean' },
	EDITLOOP_BLOCKED_WRITE_PATTERNS: { key: 'blockedWritePatterns', kind: 'list' },
	EDITLOOP_CREATE_EXISTING: { key: 'createExisting', kind: 'string' },
	EDITLOOP_INCOMPLETE_BLOCKS: { key: 'incompleteBlocks', kind: 'string' },
	EDITLOOP_CONTINUE_SIGNAL: { key: 'continueSignal', kind: 'string' },
	EDITLOOP_CONTEXT_WINDOW: { key: 'contextWindow', kind: 'number' },
};

/** Converts an environment variable value. Values which do not convert are kept as strings to fail validation */
function convert(value: string, kind: ValueKind): unknown {
	switch (kind) {
		case 'string':
			return value;
		case 'number':
			return value.trim() === '' || Number.isNaN(Number(value)) ? value : Number(value);
		case 'boolean':
			if (value === 'true') return true;
			if (value === 'false') return false;
			return value;
		case 'list':
			return value
				.split(',')
				.map((item) => item.trim())
				.filter((item) => item.length > 0);
	}
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

async function readConfigFile(projectRoot: string): Promise<Record<string, unknown>> {
	const file = path.join(projectRoot, CONFIG_FILE_NAME);
	let text: string;
	try {
		text = await readFile(file, 'utf8');
	} catch (e) {
		if (e instanceof Error && 'code' in e && e.code === 'ENOENT') return {};
		throw new ConfigurationError(`Could not read ${file}: ${errorToString(e)}`, file);
	}

	let parsed: unknown;
	try {
		parsed = JSON.parse(text);
	} catch (e) {
		throw new ConfigurationError(`${file} is not valid JSON: ${errorToString(e)}`, file);
	}
	if (!isRecord(parsed)) throw new ConfigurationError(`${file} must contain a JSON object`, file);
	return parsed;
}

function readEnvironment(): Record<string, unknown> {
	const values: Record<string, unknown> = {};
	for (const [name, { key, kind }] of Object.entries(ENV_VARS)) {
		const value = envVar(name, '');
		if (value !== '') values[key] = convert(value, kind);
	}
	return values;
}

function definedValues(overrides: Partial<EditloopConfig>): Record<string, unknown> {
	return Object.fromEntries(Object.entries(overrides).filter(([, value]) => value !== undefined));
}

/**
 * Loads the configuration of a project. Later sources take precedence:
 * the defaults, the `.editloop.json` file in the project root, the `EDITLOOP_*` environment variables, then the overrides.
 */
export async function loadEditloopConfig(projectRoot: string, overrides: Partial<EditloopConfig> = {}): Promise<EditloopConfig> {
	const fileValues = await readConfigFile(projectRoot);
	const merged: Record<string, unknown> = { ...DEFAULT_CONFIG, ...fileValues, ...readEnvironment(), ...definedValues(overrides) };

	if (!Value.Check(EditloopConfigSchema, merged)) {
		const errors = [...Value.Errors(EditloopConfigSchema, merged)].map((error) => `${error.path || '/'}: ${error.message}`);
		throw new ConfigurationError(`Invalid configuration: ${errors.join('; ')}`, projectRoot);
	}
	if (merged.tokenWarningThreshold > merged.tokenCriticalThreshold) {
		throw new ConfigurationError('Invalid configuration: tokenWarningThreshold must not be greater than tokenCriticalThreshold', projectRoot);
	}
	logger.debug({ model: merged.model, applyMode: merged.applyMode, maxRounds: merged.maxRounds }, 'Loaded configuration');
	return merged;
}
