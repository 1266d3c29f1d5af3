import { QuoteStyle } from './capabilities';

const PLAIN_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export const quoteIdentifier = (name: string, style: QuoteStyle, always: boolean) => {
  if (!always && PLAIN_IDENTIFIER.test(name)) return name;
  switch (style) {
    case 'backtick':
      return `\`${name.replace(/`/g, '\\`')}\``;
    case 'bracket':
      return `[${name.replace(/]/g, ']]')}]`;
    case 'double':
      return `"${name.replace(/"/g, '""')}"`;
  }
};

/** Single-quoted SQL string literal. */
export const sqlString = (value: string) => `'${value.replace(/'/g, "''")}'`;

/** POSIX shell single quoting. */
export const shellQuote = (value: string) => `'${value.replace(/'/g, `'\\''`)}'`;
