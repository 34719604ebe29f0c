import { DEFAULT_FILTER_CONFIG, DEFAULT_LOG_COMPARISON_CONFIG } from '../common/Config';
import type { LogComparisonConfig, MembershipFilterConfig } from '../common/Config';
import { InvalidArgumentError } from '../common/Errors';

export enum Command {
  CHECK_PASSWORDS = 'check-passwords',
  COMPARE_LOGS = 'compare-logs',
}

export const DEFAULT_EXISTING_PASSWORDS: readonly string[] = ['password123', 'admin123', 'qwerty123'];
export const DEFAULT_CANDIDATE_PASSWORDS: readonly string[] = ['password123', 'newpassword', 'admin123', 'guest'];

export interface PasswordCheckOptions {
  readonly filter: MembershipFilterConfig;
  readonly existing: readonly string[];
  readonly candidates: readonly string[];
}

export type CLIOptions =
  | { readonly help: true }
  | { readonly help: false; readonly command: Command.CHECK_PASSWORDS; readonly passwords: PasswordCheckOptions }
  | { readonly help: false; readonly command: Command.COMPARE_LOGS; readonly logs: LogComparisonConfig };

export class CLIParser {
  private readonly args: string[];

  constructor(args: string[] = process.argv.slice(2)) {
    this.args = args;
  }

  public parse(): CLIOptions {
    const [commandArg] = this.args;
    if (commandArg === undefined || this.hasFlag('--help') || this.hasFlag('-h')) {
      return { help: true };
    }

    const command = this.parseCommand(commandArg);
    switch (command) {
      case Command.CHECK_PASSWORDS:
        return { help: false, command, passwords: this.parsePasswordOptions() };
      case Command.COMPARE_LOGS:
        return { help: false, command, logs: this.parseLogOptions() };
    }
  }

  private parseCommand(value: string): Command {
    switch (value.toLowerCase()) {
      case Command.CHECK_PASSWORDS: return Command.CHECK_PASSWORDS;
      case Command.COMPARE_LOGS: return Command.COMPARE_LOGS;
      default: throw new InvalidArgumentError(
        `Unknown command: ${value}. Must be ${Command.CHECK_PASSWORDS} or ${Command.COMPARE_LOGS}`
      );
    }
  }

  private parsePasswordOptions(): PasswordCheckOptions {
    return {
      filter: {
        bitArraySize: this.getNumber('--size') ?? DEFAULT_FILTER_CONFIG.bitArraySize,
        hashCount: this.getNumber('--hashes') ?? DEFAULT_FILTER_CONFIG.hashCount,
      },
      existing: this.getList('--existing') ?? DEFAULT_EXISTING_PASSWORDS,
      candidates: this.getList('--check') ?? DEFAULT_CANDIDATE_PASSWORDS,
    };
  }

  private parseLogOptions(): LogComparisonConfig {
    return {
      logPath: this.getString('--log') ?? this.getPositional() ?? DEFAULT_LOG_COMPARISON_CONFIG.logPath,
      precision: this.getNumber('--precision') ?? DEFAULT_LOG_COMPARISON_CONFIG.precision,
    };
  }

  /**
   * First argument after the command that is neither a flag nor a flag's value.
   */
  private getPositional(): string | undefined {
    let skipNext = false;
    for (const arg of this.args.slice(1)) {
      if (skipNext) {
        skipNext = false;
        continue;
      }
      if (arg.startsWith('--')) {
        skipNext = !arg.includes('=');
        continue;
      }
      return arg;
    }
    return undefined;
  }

  private getString(flag: string): string | undefined {
    const prefixed = this.args.find(arg => arg.startsWith(`${flag}=`));
    if (prefixed !== undefined) {
      return prefixed.slice(flag.length + 1);
    }

    const flagIndex = this.args.indexOf(flag);
    if (flagIndex !== -1 && flagIndex + 1 < this.args.length) {
      return this.args[flagIndex + 1];
    }

    return undefined;
  }

  private getNumber(flag: string): number | undefined {
    const str = this.getString(flag);
    if (!str) return undefined;

    const num = Number(str);
    if (!Number.isInteger(num)) {
      throw new InvalidArgumentError(`Invalid number for ${flag}: ${str}`);
    }
    return num;
  }

  /**
   * Comma-separated values. Empty entries are kept so they can be
   * reported as invalid.
   */
  private getList(flag: string): string[] | undefined {
    const str = this.getString(flag);
    if (str === undefined) return undefined;
    return str.split(',');
  }

  private hasFlag(flag: string): boolean {
    return this.args.includes(flag);
  }

  public static printHelp(): void {
    console.log(`
Stream Sketches

Usage: stream-sketches <command> [options]

Commands:
  check-passwords         Check candidate passwords against a Bloom filter
  compare-logs [PATH]     Count unique client IPs exactly and with HyperLogLog

Options:
  --help, -h              Show this help message

check-passwords:
  --size=BITS             Bit array size (default: ${DEFAULT_FILTER_CONFIG.bitArraySize})
  --hashes=K              Hash functions per item (default: ${DEFAULT_FILTER_CONFIG.hashCount})
  --existing=A,B,C        Passwords already in use (default: ${DEFAULT_EXISTING_PASSWORDS.join(',')})
  --check=X,Y,Z           Candidates to check (default: ${DEFAULT_CANDIDATE_PASSWORDS.join(',')})

compare-logs:
  --log=PATH              JSON-lines access log (default: ${DEFAULT_LOG_COMPARISON_CONFIG.logPath})
  --precision=P           HyperLogLog precision, 4-18 (default: ${DEFAULT_LOG_COMPARISON_CONFIG.precision})

Examples:
  stream-sketches check-passwords --existing=hunter2,letmein --check=letmein,s3cret
  stream-sketches compare-logs ./access.log --precision=12
`);
  }
}
