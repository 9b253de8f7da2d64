/**
 * Quoted values assigned to secret-looking keys:
 *   api_key = "..."   token: '...'   PASSWORD="..."
 */
const SECRET_ASSIGNMENT = /((?:api[_\s-]?key|token|password|secret)\s*[=:]\s*)(["'])(?!REDACTED\2)[^"'\r\n]*\2/gi;

/** Bytes inspected when deciding whether content is binary. */
const BINARY_SNIFF_BYTES = 8000;

export function isBinary(content: Buffer): boolean {
  return content.subarray(0, BINARY_SNIFF_BYTES).includes(0);
}

export type RedactionResult = {
  content: Buffer;
  redactions: number;
};

/** Replace inline secret values with "REDACTED". Binary content is left alone. */
export function redactSecrets(content: Buffer): RedactionResult {
  if (isBinary(content)) return { content, redactions: 0 };

  let redactions = 0;
  const text = content.toString("utf8").replace(SECRET_ASSIGNMENT, (_match, prefix: string, quote: string) => {
    redactions++;
    return `${prefix}${quote}REDACTED${quote}`;
  });

  return redactions === 0 ? { content, redactions } : { content: Buffer.from(text, "utf8"), redactions };
}
