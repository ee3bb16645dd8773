import { SaltPolicy } from '@sealfile/core';
import { encryptDirectory } from '@sealfile/engine';
import { Command, type Command as CommandType } from 'commander';
import { printFiles, runOperation } from '../run.js';
import { dim } from '../theme.js';

export const encryptDirCommand = new Command('encrypt-dir')
	.description('Encrypt every file in a directory tree')
	.argument('<input>', 'Directory to encrypt')
	.option('-o, --output <path>', 'Output directory (default: <input>.encrypted)')
	.option('--per-file-salt', 'Derive a separate key for every file (slower)')
	.action(
		async (
			input: string,
			options: { output?: string; perFileSalt?: boolean },
			command: CommandType,
		) => {
			const verbose = command.optsWithGlobals().verbose === true;

			await runOperation('Encrypting', async ({ config, spinner, progress, passwordSource }) => {
				const report = await encryptDirectory({
					input,
					output: options.output,
					passwordSource: passwordSource(true),
					progress,
					saltPolicy: options.perFileSalt ? SaltPolicy.PER_FILE : config.saltPolicy,
				});

				if (report.files.length === 0) {
					spinner.info(`No files found in ${input} ${dim(`(created ${report.outputRoot})`)}`);
					return;
				}
				spinner.succeed(
					`Encrypted ${report.files.length} file(s) into ${report.outputRoot} ${dim(`(${report.saltPolicy} salt)`)}`,
				);
				if (verbose) printFiles(report);
			});
		},
	);
