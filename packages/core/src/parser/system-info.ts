export type SystemInfo = Record<string, string>;

// Colour escapes neofetch may emit even with --stdout on some terminals
const ANSI_PATTERN = /\u001B\[[0-9;?]*[A-Za-z]/g; // eslint-disable-line no-control-regex

/**
 * Parse `neofetch --stdout` output: `Key: Value` lines become entries,
 * the `user@host` banner and its underline are ignored.
 */
export function parseSystemInfo(output: string): SystemInfo {
  const info: SystemInfo = {};
  for (const rawLine of output.replace(ANSI_PATTERN, '').split(/\r?\n/)) {
    const line = rawLine.trim();
    const separator = line.indexOf(': ');
    if (separator <= 0) continue;
    const key = line.slice(0, separator).trim();
    const value = line.slice(separator + 2).trim();
    if (key && value && !(key in info)) {
      info[key] = value;
    }
  }
  return info;
}

/**
 * Version from a `--version` banner: `parseToolVersion('sysbench 1.0.20
 * (using system LuaJIT 2.1.0-beta3)', 'sysbench')` → `1.0.20`.
 */
export function parseToolVersion(
  output: string,
  banner: string
): string | undefined {
  const escaped = banner.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  const match = new RegExp(`${escaped}\\s+v?(\\d+(?:\\.\\d+)+[^\\s,]*)`).exec(
    output
  );
  return match?.[1];
}
