import chalk, { type ChalkInstance } from 'chalk';

// ---------------------------------------------------------------------------
// Terminal palette
//
// Monochrome by default: bold for emphasis, dim for secondary text.
// Color only for semantic meaning: green and red.
// ---------------------------------------------------------------------------

/** Success — checkmarks, completed operations. */
export const success: ChalkInstance = chalk.hex('#22c55e');

/** Danger — errors, failed files. */
export const danger: ChalkInstance = chalk.hex('#ef4444');

/** Muted — secondary text, labels, paths. */
export const dim: ChalkInstance = chalk.dim;

/** Bold — section headers, emphasis */
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

/** `label   value` row with the label padded to `width`. */
export function row(label: string, value: string, width = 12): string {
	return `  ${dim(label.padEnd(width))}${value}`;
}

// ---------------------------------------------------------------------------
// @inquirer/prompts theme
//
// Pass as `theme` option to password(), e.g.
// password({ message: 'Password', mask: '*', theme: promptTheme })
// ---------------------------------------------------------------------------

export const promptTheme = {
	prefix: {
		idle: bold('?'),
		done: success('✓'),
	},
	style: {
		answer: (text: string) => bold(text),
		highlight: (text: string) => bold(text),
		key: (text: string) => bold(`<${text}>`),
	},
};
