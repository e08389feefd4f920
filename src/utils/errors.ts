/**
 * Formats a caught value for log and feedback messages.
 */
export function errorToString(error: unknown): string {
	if (error instanceof Error) {
		const code = 'code' in error && typeof error.code === 'string' ? ` (${error.code})` : '';
		return `${error.message}${code}`;
	}
	return String(error);
}
