export type CliCommand =
  | { kind: 'host' }
  | { kind: 'clear' }
  | { kind: 'register-uri' }
  | { kind: 'spotify-login' }
  | { kind: 'help' }
  | { kind: 'join'; uri: string }
  | { kind: 'error'; message: string };

const FLAG_COMMANDS: Readonly<Record<string, CliCommand | undefined>> = {
  '--clear': { kind: 'clear' },
  '--register-uri': { kind: 'register-uri' },
  '--spotify-login': { kind: 'spotify-login' },
  '--help': { kind: 'help' },
  '-h': { kind: 'help' },
};

export const USAGE = [
  'Usage: nowplaying-presence [option | invite-uri]',
  '',
  '  (no arguments)     publish the local now-playing track until stopped',
  '  <invite-uri>       open a listen-along invite once and exit',
  '  --clear            clear the published presence and exit',
  '  --register-uri     register the invite URI schemes for this user',
  '  --spotify-login    link a Spotify account (stores a refresh token)',
  '  -h, --help         show this text',
].join('\n');

/**
 * Parses `process.argv.slice(2)`. At most one command is accepted; a
 * positional argument is an invite URI.
 */
export function parseCliArgs(argv: readonly string[]): CliCommand {
  const commands: CliCommand[] = [];
  for (const arg of argv) {
    if (arg.startsWith('-')) {
      const command = FLAG_COMMANDS[arg];
      if (!command) {
        return { kind: 'error', message: `unknown option: ${arg}` };
      }
      if (command.kind === 'help') {
        return command;
      }
      commands.push(command);
      continue;
    }
    if (arg.trim()) {
      commands.push({ kind: 'join', uri: arg.trim() });
    }
  }

  if (commands.length > 1) {
    return { kind: 'error', message: 'only one command may be given' };
  }
  return commands[0] ?? { kind: 'host' };
}

