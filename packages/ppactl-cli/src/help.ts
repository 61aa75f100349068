import { commands } from './cli.manifest';

export const VERSION = '0.1.0';

const OPTIONS: Array<[string, string]> = [
  ['-h, --help', 'Show this help'],
  ['--version', 'Print the version'],
  ['-v, --verbose', 'Debug logging'],
  ['--json', 'Machine-readable output'],
  ['-c, --config <path>', 'Configuration file (default /etc/ppactl/config.json)'],
];

export function renderHelp(): string {
  const rows = commands.map(cmd => {
    const aliases = cmd.aliases?.length ? ` (alias: ${cmd.aliases.join(', ')})` : '';
    return [cmd.usage, `${cmd.describe}${aliases}`] as const;
  });
  const width = Math.max(...rows.map(([usage]) => usage.length), ...OPTIONS.map(([flag]) => flag.length)) + 2;
  const examples = commands.flatMap(cmd => cmd.examples ?? []);

  return [
    'Usage: ppactl <command> [options]',
    '',
    'Commands:',
    ...rows.map(([usage, describe]) => `  ${usage.padEnd(width)}${describe}`),
    '',
    'Options:',
    ...OPTIONS.map(([flag, describe]) => `  ${flag.padEnd(width)}${describe}`),
    '',
    'Examples:',
    ...examples.map(example => `  ${example}`),
  ].join('\n');
}
