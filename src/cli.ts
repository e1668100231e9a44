/**
 * CLI 인자 파싱 (fx-trader run | init)
 */
export const USAGE = `Usage:
  fx-trader run <config.ini> [--once]   start the bot (--once: one fetch + one evaluation)
  fx-trader init [config.ini]           write a default configuration`;

export type Command =
  | { kind: 'run'; configPath: string; once: boolean }
  | { kind: 'init'; configPath: string }
  | { kind: 'help' };

export function parseArgs(argv: readonly string[]): Command {
  const [cmd, ...rest] = argv;
  const positional = rest.filter((a) => !a.startsWith('--'));
  switch (cmd) {
    case 'run':
      return { kind: 'run', configPath: positional[0] ?? 'config.ini', once: rest.includes('--once') };
    case 'init':
      return { kind: 'init', configPath: positional[0] ?? 'config.ini' };
    default:
      return { kind: 'help' };
  }
}
