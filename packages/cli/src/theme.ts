import chalk, { type ChalkInstance } from 'chalk';

// ---------------------------------------------------------------------------
// Palette
//
// Monochrome by default; colour marks outcomes only.
// ---------------------------------------------------------------------------

export const success: ChalkInstance = chalk.hex('#22c55e');
export const warn: ChalkInstance = chalk.hex('#f59e0b');
export const danger: ChalkInstance = chalk.hex('#ef4444');
export const dim: ChalkInstance = chalk.dim;
export const bold: ChalkInstance = chalk.bold;

// ---------------------------------------------------------------------------
// Composite helpers
// ---------------------------------------------------------------------------

export function successMark(text: string): string {
	return `${success('✓')} ${text}`;
}

export function failMark(text: string): string {
	return `${danger('✕')} ${text}`;
}

/** One `label  value` row; absent values print as a dim dash. */
export function field(label: string, value: string | number | undefined | null): void {
	const shown = value === undefined || value === null ? dim('-') : String(value);
	console.log(`  ${dim(label.padEnd(12))} ${shown}`);
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : 'Unknown error';
}
