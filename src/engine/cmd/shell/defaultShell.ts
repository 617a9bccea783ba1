export interface ShellCommand {
  command: string;
  args?: string[];
}

/**
 * The platform's standard command shell, started with no arguments.
 * Windows: %ComSpec% (normally cmd.exe). Elsewhere: $SHELL, then /bin/sh.
 */
export function resolveDefaultShell(
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env
): ShellCommand {
  if (platform === 'win32') {
    const comspec = env.ComSpec ?? env.COMSPEC;
    return { command: comspec && comspec.trim() !== '' ? comspec : 'cmd.exe', args: [] };
  }
  const shell = env.SHELL;
  return { command: shell && shell.trim() !== '' ? shell : '/bin/sh', args: [] };
}

/**
 * Parse a configured shell override such as "pwsh -NoLogo".
 * Whitespace separates arguments; no quoting rules apply.
 */
export function parseShellCommand(value: string): ShellCommand | null {
  const parts = value.trim().split(/\s+/).filter(Boolean);
  const [command, ...args] = parts;
  if (command === undefined) return null;
  return { command, args };
}
