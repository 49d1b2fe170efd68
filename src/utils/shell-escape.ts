// Tokens made only of these characters are printed as they are
const SAFE_TOKEN = /^[A-Za-z0-9_=/,.+-]+$/;

/**
 * Quote a single argument for display in a POSIX shell.
 * Example: "my file.pdf" → "'my file.pdf'", "it's" → "'it'\''s'"
 */
export function shellEscape(token: string): string {
  if (token === '') return "''";
  if (SAFE_TOKEN.test(token)) return token;
  return `'${token.replace(/'/g, `'\\''`)}'`;
}

/**
 * Join a program and its arguments into a copy-pasteable command line
 */
export function shellJoin(tokens: readonly string[]): string {
  return tokens.map(shellEscape).join(' ');
}
