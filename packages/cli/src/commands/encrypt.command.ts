import { encryptFile } from '@sealfile/engine';
import { Command } from 'commander';
import { formatBytes } from '../progress.js';
import { runOperation } from '../run.js';
import { dim } from '../theme.js';

export const encryptCommand = new Command('encrypt')
	.description('Encrypt a single file')
	.argument('<input>', 'File to encrypt')
	.option('-o, --output <path>', 'Output file (default: <input>.encrypted)')
	.action(async (input: string, options: { output?: string }) => {
		await runOperation('Encrypting', async ({ spinner, progress, passwordSource }) => {
			const result = await encryptFile({
				input,
				output: options.output,
				passwordSource: passwordSource(true),
				progress,
			});
			spinner.succeed(`Encrypted ${result.destination} ${dim(`(${formatBytes(result.bytes)})`)}`);
		});
	});
