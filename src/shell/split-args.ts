/**
 * Splits a command line on whitespace. Double quotes group words and may be
 * empty (`""`); a backslash escapes the next character inside quotes.
 */
export function splitArgs(line: string): string[] {
  const args: string[] = [];
  let current = '';
  let inToken = false;
  let quoted = false;

  for (let i = 0; i < line.length; i += 1) {
    const ch = line.charAt(i);
    if (quoted) {
      if (ch === '\\' && i + 1 < line.length) {
        i += 1;
        current += line.charAt(i);
      } else if (ch === '"') {
        quoted = false;
      } else {
        current += ch;
      }
      continue;
    }
    if (ch === '"') {
      quoted = true;
      inToken = true;
    } else if (/\s/.test(ch)) {
      if (inToken) args.push(current);
      current = '';
      inToken = false;
    } else {
      current += ch;
      inToken = true;
    }
  }

  if (quoted) throw new Error('Unterminated quote');
  if (inToken) args.push(current);
  return args;
}
