// src/lib/cli-utils.ts
// Common CLI argument parsing utilities

/**
 * Extract numeric value from argument (e.g., --max, --deadline).
 * A value that does not parse comes back as NaN for the caller to reject.
 */
export function parseNumericOption(
	args: string[],
	optionName: string,
): number | undefined {
	const raw = parseStringOption(args, optionName);
	return raw === undefined ? undefined : Number(raw);
}

/** Extract string value from argument */
export function parseStringOption(
	args: string[],
	optionName: string,
): string | undefined {
	const index = args.indexOf(optionName);
	if (index > -1 && args[index + 1]) {
		return args[index + 1];
	}
	return undefined;
}

/**
 * Check if a specific boolean flag is present in the arguments
 */
export function hasBooleanFlag(args: string[], flag: string): boolean {
	return args.includes(`--${flag}`);
}
