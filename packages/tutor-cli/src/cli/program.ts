/**
 * tutor command line
 */

import { Command, CommanderError } from 'commander';
import { getExitCode, isTutorError } from '@studyhall/tutor-core';
import { runAsk } from './commands/ask.js';
import { runConfig } from './commands/config.js';
import { runIngest } from './commands/ingest.js';
import type { CliContext } from './context.js';
import { paint } from './output.js';

export function createProgram(ctx: CliContext, setExitCode: (code: number) => void): Command {
  const program = new Command()
    .name('tutor')
    .description('Multi-agent tutoring orchestrator')
    .exitOverride()
    .configureOutput({
      writeOut: text => ctx.io.out(text.trimEnd()),
      writeErr: text => ctx.io.err(text.trimEnd()),
    });

  program
    .command('ask')
    .description('Ask the tutor a question')
    .argument('[query...]', 'question text')
    .option('-t, --tenant <id>', 'tenant id')
    .option('-g, --grade <n>', 'student grade')
    .option('-s, --subject <name>', 'subject')
    .option('-a, --answer <text>', 'student answer to grade')
    .option('-e, --expected <text>', 'reference answer')
    .option('-r, --request <file>', 'read a JSON request instead of flags')
    .option('-c, --config <file>', 'config file')
    .option('--json', 'print the wire response')
    .action(async (words: string[], options: unknown) => {
      setExitCode(await runAsk(ctx, words, options));
    });

  program
    .command('ingest')
    .description('Index a JSON corpus of passages for a tenant')
    .argument('<file>', 'corpus file')
    .requiredOption('-t, --tenant <id>', 'tenant id')
    .option('--replace', 'replace the tenant index instead of merging')
    .option('-c, --config <file>', 'config file')
    .action(async (file: string, options: unknown) => {
      setExitCode(await runIngest(ctx, file, options));
    });

  program
    .command('config')
    .description('Show the resolved configuration')
    .option('-c, --config <file>', 'config file')
    .option('--json', 'print as JSON')
    .action(async (options: unknown) => {
      setExitCode(await runConfig(ctx, options));
    });

  return program;
}

/**
 * Run the CLI and resolve to the process exit code
 */
export async function runCli(argv: string[], ctx: CliContext): Promise<number> {
  let exitCode = 0;
  const program = createProgram(ctx, code => {
    exitCode = code;
  });

  try {
    await program.parseAsync(argv, { from: 'user' });
    return exitCode;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    if (isTutorError(error)) {
      ctx.io.err(paint(ctx.io, 'red', `✗ ${error.code}: ${error.message}`));
      if (error.hint) {
        ctx.io.err(paint(ctx.io, 'gray', `  ${error.hint}`));
      }
      return getExitCode(error);
    }
    const message = error instanceof Error ? error.message : String(error);
    ctx.io.err(paint(ctx.io, 'red', `✗ ${message}`));
    return 1;
  }
}
