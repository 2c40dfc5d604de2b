/**
 * Tokenizer for control-protocol reply lines
 *
 * A reply is a topic of bare words followed by KEY=VALUE pairs, e.g.
 *   SESSION STATUS RESULT=I2P_ERROR MESSAGE="Duplicate id"
 * Values may be double-quoted and may themselves contain '='
 * (destinations are base64 with padding).
 */

export interface SamReply {
  topic: string;
  fields: Map<string, string>;
  raw: string;
}

export function parseReply(line: string): SamReply {
  const words: string[] = [];
  const fields = new Map<string, string>();

  for (const token of tokenize(line)) {
    const eq = token.indexOf('=');
    if (eq <= 0) {
      if (fields.size === 0) {
        words.push(token);
      }
      continue;
    }
    const key = token.slice(0, eq);
    let value = token.slice(eq + 1);
    if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
      value = value.slice(1, -1);
    }
    fields.set(key, value);
  }

  return { topic: words.join(' '), fields, raw: line };
}

export function isOk(reply: SamReply): boolean {
  return reply.fields.get('RESULT') === 'OK';
}

/**
 * Short description of a failed reply for error messages
 */
export function describeFailure(reply: SamReply): string {
  const result = reply.fields.get('RESULT') ?? 'no RESULT';
  const message = reply.fields.get('MESSAGE');
  return message ? `${result} (${message})` : result;
}

function tokenize(line: string): string[] {
  const tokens: string[] = [];
  let current = '';
  let quoted = false;

  for (const ch of line) {
    if (ch === '"') {
      quoted = !quoted;
      current += ch;
    } else if (!quoted && (ch === ' ' || ch === '\t')) {
      if (current) {
        tokens.push(current);
        current = '';
      }
    } else {
      current += ch;
    }
  }
  if (current) {
    tokens.push(current);
  }
  return tokens;
}
