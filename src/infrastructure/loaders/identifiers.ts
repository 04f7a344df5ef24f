/** Quotes each dot-separated part, so `public.taq_trades` keeps its schema. */
export function quoteIdentifier(name: string): string {
  const parts = name.split(".");
  if (parts.some((p) => p.length === 0)) {
    throw new Error(`Invalid table name: "${name}"`);
  }
  return parts.map((p) => `"${p.replaceAll('"', '""')}"`).join(".");
}

export function quoteLiteral(value: string): string {
  return `'${value.replaceAll("'", "''")}'`;
}
