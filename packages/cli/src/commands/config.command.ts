import { Command } from 'commander';
import {
	CONFIG_KEYS,
	defaultConfig,
	getConfigPath,
	loadConfig,
	saveConfig,
	setConfigValue,
} from '../config.js';
import { reportError } from '../run.js';
import { bold, dim, row, successMark } from '../theme.js';

const showCommand = new Command('show').description('Print the effective configuration').action(() => {
	try {
		const config = loadConfig();
		const defaults = defaultConfig();

		console.log('');
		console.log(`  ${bold('Config')} ${dim(getConfigPath())}`);
		console.log('');
		for (const key of CONFIG_KEYS) {
			const marker = config[key] === defaults[key] ? dim(' (default)') : '';
			console.log(row(key, `${config[key]}${marker}`, 20));
		}
		console.log('');
	} catch (error: unknown) {
		reportError(error);
	}
});

const setCommand = new Command('set')
	.description(`Set a configuration value (${CONFIG_KEYS.join(', ')})`)
	.argument('<key>', 'Config key')
	.argument('<value>', 'New value')
	.action((key: string, value: string) => {
		try {
			const updated = setConfigValue(loadConfig(), key, value);
			const path = saveConfig(updated);
			console.log(`\n  ${successMark(`${key} = ${value}`)} ${dim(path)}\n`);
		} catch (error: unknown) {
			reportError(error);
		}
	});

export const configCommand = new Command('config')
	.description('Show or change user configuration')
	.addCommand(showCommand)
	.addCommand(setCommand);
