/**
 * Verbose Output Helpers
 *
 * Formats external commands for --verbose CLI output. Used by
 * ProcessRunner to print each command to stderr before it runs.
 */

/**
 * Prefix for verbose command output lines.
 */
const PREFIX = '[$] ';

/**
 * Indent for continuation lines (matches PREFIX width).
 */
const CONTINUATION_INDENT = '    ';

/**
 * ANSI SGR 90 — bright black (gray) foreground.
 */
const ANSI_GRAY = '\x1b[90m';

/**
 * ANSI SGR 0 — reset all attributes.
 */
const ANSI_RESET = '\x1b[0m';

/**
 * Characters that need no quoting in a POSIX shell word.
 */
const SAFE_WORD = /^[A-Za-z0-9_@%+=:,./-]+$/;

/**
 * Check whether stderr supports ANSI escape codes.
 *
 * Returns true when stderr is a TTY (interactive terminal).
 */
export function supportsAnsi(): boolean {
  return Boolean(process.stderr.isTTY);
}

/**
 * Quote one argument for display as a POSIX shell word.
 */
export function quoteArg(arg: string): string {
  if (arg !== '' && SAFE_WORD.test(arg)) {
    return arg;
  }
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

/**
 * Render an argument vector as a copy-pasteable shell command line.
 */
export function formatArgv(argv: readonly string[]): string {
  return argv.map(quoteArg).join(' ');
}

/**
 * Format a command for verbose output.
 *
 * - First line prefixed with `[$] `
 * - Continuation lines (multi-line hook scripts) indented to match
 * - Optionally wrapped in ANSI gray (SGR 90) when `ansi` is true
 *
 * @param command - Command line or script text
 * @param ansi - Whether to wrap output in ANSI gray escape codes
 * @returns Formatted string ready for `process.stderr.write()`
 */
export function formatCommand(command: string, ansi: boolean): string {
  const lines = command.split('\n');

  let body = '';
  lines.forEach((line, i) => {
    body += i === 0 ? `${PREFIX}${line}\n` : `${CONTINUATION_INDENT}${line}\n`;
  });

  if (ansi) {
    return `${ANSI_GRAY}${body}${ANSI_RESET}`;
  }

  return body;
}
