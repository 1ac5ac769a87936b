/**
 * HEOS CLI line framing.
 * Messages in both directions end with CRLF; inbound, a bare LF is accepted too.
 */

import { ProtocolError } from '../errors.js';

export const LINE_TERMINATOR = '\r\n';

const LF = 0x0a;
const CR = 0x0d;

export function encodeLine(line: string): Buffer {
  return Buffer.from(`${line}${LINE_TERMINATOR}`, 'utf-8');
}

/**
 * Split a buffer into complete lines. Blank lines are skipped.
 * Throws `ProtocolError` when a line (complete or still buffered) exceeds `maxLength` bytes.
 */
export function parseLines(buffer: Buffer, maxLength: number): { lines: string[]; remainder: Buffer } {
  const lines: string[] = [];
  let offset = 0;

  while (offset < buffer.length) {
    const end = buffer.indexOf(LF, offset);
    if (end === -1) break; // incomplete line

    const contentEnd = end > offset && buffer[end - 1] === CR ? end - 1 : end;
    if (contentEnd - offset > maxLength) {
      throw new ProtocolError(`Inbound message exceeds ${maxLength} bytes`);
    }
    const line = buffer.toString('utf-8', offset, contentEnd);
    if (line.trim().length > 0) lines.push(line);
    offset = end + 1;
  }

  const remainder = Buffer.from(buffer.subarray(offset));
  if (remainder.length > maxLength) {
    throw new ProtocolError(`Inbound message exceeds ${maxLength} bytes without a terminator`);
  }
  return { lines, remainder };
}
