import { decryptFile } from '@sealfile/engine';
import { Command } from 'commander';
import { formatBytes } from '../progress.js';
import { runOperation } from '../run.js';
import { dim } from '../theme.js';

export const decryptCommand = new Command('decrypt')
	.description('Decrypt a single file')
	.argument('<input>', 'Encrypted file')
	.option(
		'-o, --output <path>',
		'Output file (default: <input> without .encrypted, or <input>.decrypted)',
	)
	.action(async (input: string, options: { output?: string }) => {
		await runOperation('Decrypting', async ({ spinner, progress, passwordSource }) => {
			const result = await decryptFile({
				input,
				output: options.output,
				passwordSource: passwordSource(false),
				progress,
			});
			spinner.succeed(`Decrypted ${result.destination} ${dim(`(${formatBytes(result.bytes)})`)}`);
		});
	});
