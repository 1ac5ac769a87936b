/**
 * HEOS CLI message grammar.
 *
 * Outbound: `heos://<namespace>/<command>?key=value&key=value`
 * Inbound: one JSON object per line,
 *   `{"heos": {"command": "...", "result": "success|fail", "message": "k=v&k=v"}, "payload": ..., "options": ...}`
 * Events carry a command starting with `event/` and no result.
 */

import { ProtocolError } from '../errors.js';
import { isRecord } from '../util/values.js';

export type CommandNamespace = 'system' | 'player' | 'group' | 'browse';

export type AttributeValue = string | number | boolean;

export interface HeosCommand {
  namespace: CommandNamespace;
  name: string;
  attributes: Readonly<Record<string, AttributeValue | undefined>>;
}

export type Attributes = Readonly<Record<string, string>>;

export interface HeosResponse {
  kind: 'response';
  /** `namespace/name`, as echoed by the device */
  command: string;
  result: 'success' | 'fail';
  message: string;
  attributes: Attributes;
  payload: unknown;
  options: unknown;
}

export interface RawEvent {
  kind: 'event';
  /** Event name without the `event/` prefix */
  name: string;
  message: string;
  attributes: Attributes;
}

/** A response addressed to a command whose `result` field is missing or unknown. */
export interface MalformedResponse {
  kind: 'malformed';
  command: string;
  message: string;
  attributes: Attributes;
  reason: string;
}

export type InboundMessage = HeosResponse | RawEvent | MalformedResponse;

export const SEQUENCE_ATTRIBUTE = 'SEQUENCE';

const EVENT_PREFIX = 'event/';
const UNDER_PROCESS = 'command under process';

export function commandPath(command: HeosCommand): string {
  return `${command.namespace}/${command.name}`;
}

export function encodeAttributeValue(value: AttributeValue): string {
  const text = typeof value === 'boolean' ? (value ? 'on' : 'off') : String(value);
  return text.replace(/%/g, '%25').replace(/&/g, '%26').replace(/=/g, '%3D');
}

/** Render a command as the line sent on the wire (without terminator). */
export function encodeCommand(command: HeosCommand, sequence?: number): string {
  const pairs: string[] = [];
  for (const [key, value] of Object.entries(command.attributes)) {
    if (value === undefined) continue;
    pairs.push(`${key}=${encodeAttributeValue(value)}`);
  }
  if (sequence !== undefined) {
    pairs.push(`${SEQUENCE_ATTRIBUTE}=${sequence}`);
  }
  const query = pairs.length > 0 ? `?${pairs.join('&')}` : '';
  return `heos://${commandPath(command)}${query}`;
}

function decodeComponent(text: string): string {
  const spaced = text.replace(/\+/g, ' ');
  try {
    return decodeURIComponent(spaced);
  } catch {
    // Lone '%' characters are sent unescaped by some firmware.
    return spaced;
  }
}

/** Parse a `message` field into attributes. Bare flags map to an empty string. */
export function parseAttributes(message: string): Attributes {
  const attributes: Record<string, string> = {};
  if (!message) return attributes;
  for (const part of message.split('&')) {
    if (!part) continue;
    const eq = part.indexOf('=');
    if (eq === -1) {
      attributes[decodeComponent(part)] = '';
    } else {
      attributes[decodeComponent(part.substring(0, eq))] = decodeComponent(part.substring(eq + 1));
    }
  }
  return attributes;
}

/**
 * Decode one inbound line. Throws `ProtocolError` when the line is not a HEOS message at all.
 */
export function decodeMessage(line: string): InboundMessage {
  let data: unknown;
  try {
    data = JSON.parse(line);
  } catch (err) {
    throw new ProtocolError(`Inbound message is not JSON: ${line.slice(0, 80)}`, { cause: err });
  }
  if (!isRecord(data) || !isRecord(data.heos) || typeof data.heos.command !== 'string') {
    throw new ProtocolError(`Inbound message has no heos.command: ${line.slice(0, 80)}`);
  }

  const heos = data.heos;
  const command = String(heos.command);
  const message = typeof heos.message === 'string' ? heos.message : '';
  const attributes = parseAttributes(message);

  if (command.startsWith(EVENT_PREFIX)) {
    return { kind: 'event', name: command.substring(EVENT_PREFIX.length), message, attributes };
  }

  const result = heos.result;
  if (result !== 'success' && result !== 'fail') {
    return {
      kind: 'malformed',
      command,
      message,
      attributes,
      reason: `unexpected result ${JSON.stringify(result)}`,
    };
  }

  return {
    kind: 'response',
    command,
    result,
    message,
    attributes,
    payload: data.payload,
    options: data.options,
  };
}

/** An acknowledgement that the device accepted the command and will answer later. */
export function isUnderProcess(response: HeosResponse): boolean {
  return response.result === 'success' && response.message.startsWith(UNDER_PROCESS);
}
