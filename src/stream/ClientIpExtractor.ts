import { isIP } from 'net';

export type LogRecord = Record<string, unknown>;

const FORWARDED_FOR_FIELD = 'http_x_forwarded_for';
const REMOTE_ADDR_FIELD = 'remote_addr';

/**
 * Parse one JSON-lines entry. Blank lines, invalid JSON and anything that
 * is not a JSON object yield null.
 */
export function parseRecord(line: string): LogRecord | null {
  const trimmed = line.trim();
  if (trimmed === '') {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch {
    return null;
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return null;
  }
  return Object.fromEntries(Object.entries(parsed));
}

function validIp(candidate: string): string | null {
  const trimmed = candidate.trim();
  if (trimmed === '') {
    return null;
  }
  return isIP(trimmed) !== 0 ? trimmed : null;
}

/**
 * The first forwarded-for hop when it is a valid address, otherwise
 * remote_addr when valid, otherwise null.
 */
export function extractClientIp(record: LogRecord): string | null {
  const forwardedFor = record[FORWARDED_FOR_FIELD];
  if (typeof forwardedFor === 'string' && forwardedFor.trim() !== '') {
    const [firstHop = ''] = forwardedFor.split(',');
    const ip = validIp(firstHop);
    if (ip) {
      return ip;
    }
  }

  const remoteAddr = record[REMOTE_ADDR_FIELD];
  if (typeof remoteAddr === 'string') {
    return validIp(remoteAddr);
  }

  return null;
}

export async function* clientIps(lines: AsyncIterable<string> | Iterable<string>): AsyncGenerator<string> {
  for await (const line of lines) {
    const record = parseRecord(line);
    if (record === null) {
      continue;
    }
    const ip = extractClientIp(record);
    if (ip !== null) {
      yield ip;
    }
  }
}
