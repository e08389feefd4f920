import Pino from 'pino';

const logLevel = process.env.LOG_LEVEL || 'info';

// Logs go to stderr so the CLI's own output on stdout stays readable and pipeable
const STDERR = 2;

// When running interactively log in a human-readable format and not JSON
const transport =
	process.env.LOG_PRETTY === 'true'
		? {
				target: 'pino-pretty',
				options: {
					colorize: true,
					destination: STDERR,
				},
			}
		: undefined;

// Fields that should not be considered "custom" keys
const standardFields = new Set(['level', 'time', 'pid', 'hostname', 'msg', 'err', 'stack_trace']);

/**
 * Application wide pino logger.
 */
export const logger: Pino.Logger = Pino(
	{
		level: logLevel.toLowerCase(),
		formatters: {
			log(object: Record<string, unknown>) {
				const err = object.err;
				const stackProp = err instanceof Error && err.stack ? { stack_trace: err.stack } : {};

				// Append the custom keys to the message eg [path, tier] so a reader of the logs knows what additional information was logged
				if (typeof object.msg === 'string') {
					const customKeys = Object.keys(object).filter((key) => !standardFields.has(key));
					if (customKeys.length > 0) object.msg = `${object.msg} [${customKeys.join(', ')}]`;
				}

				return { ...object, ...stackProp };
			},
		},
		transport,
	},
	transport ? undefined : Pino.destination(STDERR),
);
