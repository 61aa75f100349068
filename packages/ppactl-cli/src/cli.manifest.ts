/**
 * ppactl CLI manifest
 */
import type { CommandModule } from './commands/types';

export type CommandManifest = {
  id: string;
  aliases?: string[];
  usage: string;
  describe: string;
  examples?: string[];
  loader: () => Promise<CommandModule>;
};

export const commands: CommandManifest[] = [
  {
    id: 'install',
    usage: 'install <repo> [pr]',
    describe: 'Enable a repository and upgrade; with a pull request, only if its CI build succeeded',
    examples: [
      'ppactl install stable',
      'ppactl install myrepo 42',
    ],
    loader: async () => import('./commands/install'),
  },
  {
    id: 'remove',
    aliases: ['uninstall'],
    usage: 'remove <repo>',
    describe: 'Disable an installed repository and upgrade',
    examples: ['ppactl remove stable'],
    loader: async () => import('./commands/remove'),
  },
  {
    id: 'list',
    usage: 'list',
    describe: 'List installed repositories',
    examples: ['ppactl list --json'],
    loader: async () => import('./commands/list'),
  },
  {
    id: 'update',
    usage: 'update',
    describe: 'Refresh the package index and upgrade all packages',
    loader: async () => import('./commands/update'),
  },
];

export function findCommand(name: string): CommandManifest | undefined {
  return commands.find(cmd => cmd.id === name || (cmd.aliases ?? []).includes(name));
}
