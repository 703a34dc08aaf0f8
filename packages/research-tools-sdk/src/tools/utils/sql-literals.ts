export const quoteIdentifier = (name: string): string =>
  `"${name.replace(/"/g, '""')}"`;

export const quoteLiteral = (value: string): string =>
  `'${value.replace(/'/g, "''")}'`;
