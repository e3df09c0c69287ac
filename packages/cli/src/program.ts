import { Command } from 'commander';
import pkg from '../package.json';
import { registerAnalyzeCommand } from './commands/analyze';
import { registerDoctorCommand } from './commands/doctor';
import { registerGenerateCommand } from './commands/generate';
import { registerJudgeCommand } from './commands/judge';
import { registerQcCommand } from './commands/qc';
import { registerRunCommand } from './commands/run';
import { registerScoreCommand } from './commands/score';
import type { CliDeps } from './session';

export function createProgram(deps: CliDeps = {}): Command {
  const program = new Command();

  program
    .name('contentbench')
    .description('Generate, analyse, judge and rank LLM-written articles')
    .version(pkg.version)
    .option('--json', 'Output results as JSON')
    .option('--config <path>', 'Path to configuration file')
    .option('--verbose', 'Enable verbose logging')
    .option('--out <dir>', 'Directory for store files (overrides output.dir)');

  registerGenerateCommand(program, deps);
  registerAnalyzeCommand(program, deps);
  registerJudgeCommand(program, deps);
  registerScoreCommand(program, deps);
  registerRunCommand(program, deps);
  registerQcCommand(program, deps);
  registerDoctorCommand(program, deps);

  return program;
}
