import { Command } from 'commander';
import { configCommand } from './commands/config.command.js';
import { decryptDirCommand } from './commands/decrypt-dir.command.js';
import { decryptCommand } from './commands/decrypt.command.js';
import { encryptDirCommand } from './commands/encrypt-dir.command.js';
import { encryptCommand } from './commands/encrypt.command.js';
import { inspectCommand } from './commands/inspect.command.js';
import { dim } from './theme.js';

export { loadConfig, saveConfig, setConfigValue } from './config.js';
export type { SealfileConfig } from './config.js';
export { createPasswordSource } from './prompt.js';

export async function runCli(argv: readonly string[] = process.argv): Promise<void> {
	const program = new Command();

	program
		.name('sealfile')
		.description('Password-based file and directory encryption (Argon2id + AES-256-GCM)')
		.version('0.1.0')
		.option('-v, --verbose', 'List every processed file')
		.addHelpText(
			'after',
			`
${dim('Examples:')}
  $ sealfile encrypt report.txt          Writes report.txt.encrypted
  $ sealfile decrypt report.txt.encrypted
  $ sealfile encrypt-dir photos          Writes photos.encrypted/
  $ sealfile decrypt-dir photos.encrypted
  $ sealfile inspect report.txt.encrypted

${dim('Set SEALFILE_PASSWORD to skip the password prompt.')}
`,
		);

	program.addCommand(encryptCommand);
	program.addCommand(decryptCommand);
	program.addCommand(encryptDirCommand);
	program.addCommand(decryptDirCommand);
	program.addCommand(inspectCommand);
	program.addCommand(configCommand);

	await program.parseAsync([...argv]);
}
