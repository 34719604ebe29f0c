import { CLIParser, Command } from './CLIParser';
import { runLogComparison, runPasswordCheck } from './Commands';
import type { OutputSink } from './Commands';
import { SketchError } from '../common/Errors';

const stdout: OutputSink = (line) => console.log(line);
const stderr: OutputSink = (line) => console.error(line);

/**
 * Parse `args`, run the chosen command and return the process exit status.
 */
export async function main(
  args: string[],
  out: OutputSink = stdout,
  err: OutputSink = stderr
): Promise<number> {
  try {
    const options = new CLIParser(args).parse();

    if (options.help) {
      CLIParser.printHelp();
      return 0;
    }

    switch (options.command) {
      case Command.CHECK_PASSWORDS:
        runPasswordCheck(options.passwords, out);
        return 0;
      case Command.COMPARE_LOGS:
        await runLogComparison(options.logs, out);
        return 0;
    }
  } catch (error) {
    if (error instanceof SketchError) {
      err(`Error: ${error.message}`);
    } else {
      err(`Fatal error: ${error instanceof Error ? error.stack ?? error.message : String(error)}`);
    }
    return 1;
  }
}
