/** Single-quoted string literal for generated code. */
export function quote(text: string): string {
  return `'${text.replace(/\\/g, '\\\\').replace(/'/g, "\\'").replace(/\n/g, '\\n')}'`;
}

/** Text safe to place inside a block comment. */
export function commentSafe(text: string): string {
  return text.replace(/\*\//g, '*\\/');
}

export function quoteList(items: string[]): string {
  return `[${items.map(quote).join(', ')}]`;
}
