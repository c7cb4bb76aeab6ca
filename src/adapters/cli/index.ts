import { Command } from 'commander';
import { createTranscriptCommand } from './commands/transcript.js';
import { createCuesCommand } from './commands/cues.js';
import { createSummaryCommand } from './commands/summary.js';

export function createCLI(): Command {
  const program = new Command()
    .name('sermon-summarize')
    .description('Genera CUEs de secciones y el resumen del mensaje de un culto a partir de su transcripción')
    .version('1.0.0');

  program.addCommand(createTranscriptCommand());
  program.addCommand(createCuesCommand());
  program.addCommand(createSummaryCommand(), { isDefault: true });

  return program;
}
