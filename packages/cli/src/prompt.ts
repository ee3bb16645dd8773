import { password } from '@inquirer/prompts';
import { ArgumentError, type PasswordSource } from '@sealfile/core';
import { promptTheme } from './theme.js';

export const PASSWORD_ENV = 'SEALFILE_PASSWORD';

export interface PasswordSourceOptions {
	/** Ask a second time and require both entries to match (encryption). */
	readonly confirm: boolean;
	readonly env?: NodeJS.ProcessEnv;
	/** Hidden-input prompt; defaults to a masked @inquirer/prompts password prompt. */
	readonly ask?: (message: string) => Promise<string>;
}

/**
 * Password source for the engine. `SEALFILE_PASSWORD` wins when set so the CLI
 * can run unattended; otherwise the user is prompted.
 */
export function createPasswordSource(options: PasswordSourceOptions): PasswordSource {
	const env = options.env ?? process.env;
	const ask = options.ask ?? promptHidden;

	return async () => {
		const fromEnv = env[PASSWORD_ENV];
		if (fromEnv !== undefined && fromEnv.length > 0) {
			return fromEnv;
		}

		const first = await ask('Password');
		if (first.length === 0) {
			throw new ArgumentError('Password must not be empty');
		}

		if (options.confirm) {
			const second = await ask('Confirm password');
			if (second !== first) {
				throw new ArgumentError('Passwords do not match');
			}
		}

		return first;
	};
}

export function promptHidden(message: string): Promise<string> {
	return password({ message, mask: '*', theme: promptTheme });
}
