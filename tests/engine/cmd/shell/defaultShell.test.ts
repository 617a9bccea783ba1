import { parseShellCommand, resolveDefaultShell } from '@/engine/cmd/shell/defaultShell';

describe('resolveDefaultShell', () => {
  test('uses ComSpec on Windows', () => {
    expect(resolveDefaultShell('win32', { ComSpec: 'C:\\Windows\\system32\\cmd.exe' })).toEqual({
      command: 'C:\\Windows\\system32\\cmd.exe',
      args: [],
    });
    expect(resolveDefaultShell('win32', {})).toEqual({ command: 'cmd.exe', args: [] });
  });

  test('uses $SHELL elsewhere, then /bin/sh', () => {
    expect(resolveDefaultShell('linux', { SHELL: '/bin/zsh' })).toEqual({ command: '/bin/zsh', args: [] });
    expect(resolveDefaultShell('darwin', { SHELL: '  ' })).toEqual({ command: '/bin/sh', args: [] });
    expect(resolveDefaultShell('linux', {})).toEqual({ command: '/bin/sh', args: [] });
  });
});

describe('parseShellCommand', () => {
  test('splits the command from its arguments', () => {
    expect(parseShellCommand(' pwsh -NoLogo   -NoProfile ')).toEqual({
      command: 'pwsh',
      args: ['-NoLogo', '-NoProfile'],
    });
    expect(parseShellCommand('bash')).toEqual({ command: 'bash', args: [] });
  });

  test('returns null for a blank value', () => {
    expect(parseShellCommand('   ')).toBeNull();
  });
});
