const SAFE_WORD = /^[A-Za-z0-9_@%+=:,./-]+$/;

/** Quote `value` for a POSIX shell command line. */
export function shellQuote(value: string): string {
  if (value.length > 0 && SAFE_WORD.test(value)) return value;
  return `'${value.replaceAll("'", `'"'"'`)}'`;
}

export function shellJoin(words: readonly string[]): string {
  return words.map(shellQuote).join(' ');
}
