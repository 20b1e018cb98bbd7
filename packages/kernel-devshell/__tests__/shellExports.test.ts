import { describe, expect, it } from 'vitest';

import { quoteShell, renderShellExports, renderShellHook } from '../src/lib/shellExports';

describe('shell exports', () => {
  it('renders one export per variable', () => {
    expect(renderShellExports({ JUPYTER_PATH: '/work/project/.jupyter' })).toBe(
      "export JUPYTER_PATH='/work/project/.jupyter'\n",
    );
    expect(renderShellExports({})).toBe('');
  });

  it('escapes single quotes and leaves other shell syntax inert', () => {
    expect(quoteShell("it's")).toBe(`'it'\\''s'`);
    expect(renderShellExports({ JUPYTER_PATH: '/tmp/$HOME `x`' })).toBe("export JUPYTER_PATH='/tmp/$HOME `x`'\n");
  });

  it('refuses invalid variable names', () => {
    expect(() => renderShellExports({ 'JUPYTER-PATH': '/x' })).toThrow('invalid environment variable name: JUPYTER-PATH');
  });

  it('renders the activation hook', () => {
    expect(renderShellHook({ profile: 'full' })).toBe(
      `eval "$(kernel-devshell bootstrap --profile 'full' --session-root "$PWD")"\n`,
    );
    expect(renderShellHook({ profile: 'full', executable: 'npx kernel-devshell' })).toBe(
      `eval "$(npx kernel-devshell bootstrap --profile 'full' --session-root "$PWD")"\n`,
    );
  });
});
