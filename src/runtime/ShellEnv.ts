const ASSIGNMENT = /^([A-Za-z_][A-Za-z0-9_]*)=('(?:[^']|'\\'')*'|"(?:[^"\\]|\\.)*"|[^;\s]*)\s*;?/;

/**
 * Parses the POSIX-shell output of toolchain environment commands such as `opam env`:
 *
 *   OPAM_SWITCH_PREFIX='/home/radio/.opam/default'; export OPAM_SWITCH_PREFIX;
 *
 * Lines that are not plain assignments are ignored.
 */
export function parseShellEnv(output: string): Record<string, string> {
  const env: Record<string, string> = {};
  for (const rawLine of output.split('\n')) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) {
      continue;
    }
    const match = ASSIGNMENT.exec(line);
    if (!match) {
      continue;
    }
    env[match[1]] = unquote(match[2]);
  }
  return env;
}

function unquote(value: string): string {
  if (value.length >= 2 && value.startsWith("'") && value.endsWith("'")) {
    return value.slice(1, -1).replace(/'\\''/g, "'");
  }
  if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
    return value.slice(1, -1).replace(/\\(.)/g, '$1');
  }
  return value;
}
