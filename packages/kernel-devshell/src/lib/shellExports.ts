const VARIABLE_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

export const quoteShell = (value: string): string => `'${value.replace(/'/g, `'\\''`)}'`;

export function renderShellExports(exports: Record<string, string>): string {
  const lines: string[] = [];
  for (const [name, value] of Object.entries(exports)) {
    if (!VARIABLE_NAME.test(name)) throw new Error(`invalid environment variable name: ${name}`);
    lines.push(`export ${name}=${quoteShell(value)}`);
  }
  return lines.length > 0 ? `${lines.join('\n')}\n` : '';
}

export type ShellHookOptions = {
  executable?: string;
  profile: string;
};

// Snippet a dev shell definition embeds as its activation hook
export function renderShellHook(options: ShellHookOptions): string {
  const executable = options.executable ?? 'kernel-devshell';
  return `eval "$(${executable} bootstrap --profile ${quoteShell(options.profile)} --session-root "$PWD")"\n`;
}
