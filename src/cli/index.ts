#!/usr/bin/env node

import { Command } from 'commander';
import { checkCommand } from './commands/check.js';
import { modelsCommand } from './commands/models.js';
import { quizCommand } from './commands/quiz.js';
import { BANNER_MINIMAL, style, welcomeMessage } from './theme.js';

const program = new Command();

program
  .name('recall')
  .description(`${BANNER_MINIMAL}\n\nLLM-generated questions about your own notes, graded PASS or FAIL.`)
  .version('0.1.0')
  .configureHelp({
    sortSubcommands: true,
    subcommandTerm: (cmd) => style.command(cmd.name()) + ' ' + style.dim(cmd.usage()),
  })
  .addHelpText('afterAll', `
${style.bold('Examples:')}

  ${style.dim('# Start a quiz with the provider from .env')}
  $ recall quiz

  ${style.dim('# Make sure Ollama and the model are ready')}
  $ recall check

${style.muted('For more info, run any command with --help')}
`);

const welcomeCmd = new Command('welcome')
  .description('Show welcome message and quick start guide')
  .action(() => {
    console.log(welcomeMessage());
  });

program.addCommand(quizCommand);
program.addCommand(checkCommand);
program.addCommand(modelsCommand);
program.addCommand(welcomeCmd);

if (process.argv.length === 2) {
  console.log(welcomeMessage());
  process.exit(0);
}

await program.parseAsync(process.argv);
