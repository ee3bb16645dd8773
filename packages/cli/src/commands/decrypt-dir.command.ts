import { decryptDirectory } from '@sealfile/engine';
import { Command, type Command as CommandType } from 'commander';
import { printFiles, runOperation } from '../run.js';
import { dim } from '../theme.js';

export const decryptDirCommand = new Command('decrypt-dir')
	.description('Decrypt every .encrypted file in a directory tree')
	.argument('<input>', 'Directory of encrypted files')
	.option(
		'-o, --output <path>',
		'Output directory (default: <input> without .encrypted, or <input>_decrypted)',
	)
	.action(async (input: string, options: { output?: string }, command: CommandType) => {
		const verbose = command.optsWithGlobals().verbose === true;

		await runOperation('Decrypting', async ({ spinner, progress, passwordSource }) => {
			const report = await decryptDirectory({
				input,
				output: options.output,
				passwordSource: passwordSource(false),
				progress,
			});

			if (report.files.length === 0) {
				spinner.info(`No .encrypted files found in ${input} ${dim(`(created ${report.outputRoot})`)}`);
				return;
			}
			spinner.succeed(`Decrypted ${report.files.length} file(s) into ${report.outputRoot}`);
			if (verbose) printFiles(report);
		});
	});
