import { XMLParser } from 'fast-xml-parser';
import { InvalidArgumentError } from '../errors/wam-errors.js';

export const WAM_PORT = 55001;

export type Endpoint = 'UIC' | 'CPM';

export type CommandParam =
  | { type: 'str'; name: string; value: string }
  | { type: 'dec'; name: string; value: number }
  | { type: 'cdata'; name: string; value: string };

export interface Command {
  name: string;
  params: CommandParam[];
}

// Content-provider commands live under /CPM, everything else under /UIC
const CPM_COMMANDS: ReadonlySet<string> = new Set([
  'GetCpInfo',
  'GetCpList',
  'GetRadioInfo',
  'SetCpService',
  'SetPlaySelect'
]);

export function str(name: string, value: string): CommandParam {
  return { type: 'str', name, value };
}

export function dec(name: string, value: number): CommandParam {
  return { type: 'dec', name, value };
}

export function cdata(name: string, value: string): CommandParam {
  return { type: 'cdata', name, value };
}

export function command(name: string, ...params: CommandParam[]): Command {
  return { name, params };
}

export function endpointFor(commandName: string): Endpoint {
  return CPM_COMMANDS.has(commandName) ? 'CPM' : 'UIC';
}

function escapeAttribute(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

// "]]>" would close the section early, so it is split across two sections
function wrapCdata(value: string): string {
  return `<![CDATA[${value.split(']]>').join(']]]]><![CDATA[>')}]]>`;
}

function buildParam(param: CommandParam): string {
  const name = escapeAttribute(param.name);
  switch (param.type) {
    case 'str':
      return `<p type="str" name="${name}" val="${escapeAttribute(param.value)}"/>`;
    case 'dec':
      if (!Number.isFinite(param.value)) {
        throw new InvalidArgumentError(`Parameter ${param.name} must be a finite number`, param.name, param.value);
      }
      return `<p type="dec" name="${name}" val="${param.value}"/>`;
    case 'cdata':
      // The device reads the CDATA body; val="empty" is a placeholder it expects
      return `<p type="cdata" name="${name}" val="empty">${wrapCdata(param.value)}</p>`;
  }
}

/**
 * Serialize a command to the XML fragment the speaker expects
 */
export function buildCommandXml(cmd: Command): string {
  return `<name>${cmd.name}</name>${cmd.params.map(buildParam).join('')}`;
}

/**
 * Percent-encode everything outside the RFC 3986 unreserved set, then put
 * back the literal '/' and '=' the speaker's decoder insists on.
 */
export function encodeCommand(cmd: Command): string {
  return encodeURIComponent(buildCommandXml(cmd))
    .replace(/[!'()*]/g, c => `%${c.charCodeAt(0).toString(16).toUpperCase()}`)
    .replace(/%2F/g, '/')
    .replace(/%3D/g, '=');
}

export function commandUrl(address: string, cmd: Command, port = WAM_PORT): string {
  return `http://${address}:${port}/${endpointFor(cmd.name)}?cmd=${encodeCommand(cmd)}`;
}

const commandParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  cdataPropName: '__cdata',
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: false,
  isArray: (name) => name === 'p'
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function attribute(node: Record<string, unknown>, name: string): string | undefined {
  const value = node[`@_${name}`];
  return typeof value === 'string' ? value : undefined;
}

function cdataBody(node: Record<string, unknown>): string {
  const body = node.__cdata;
  if (Array.isArray(body)) {
    return body.filter((part): part is string => typeof part === 'string').join('');
  }
  return typeof body === 'string' ? body : '';
}

/**
 * Inverse of encodeCommand(); used to inspect captured requests
 */
export function decodeCommand(encoded: string): Command {
  const xml = decodeURIComponent(encoded);
  const parsed: unknown = commandParser.parse(`<cmd>${xml}</cmd>`);
  const root = isRecord(parsed) ? parsed.cmd : undefined;
  const name = isRecord(root) ? root.name : undefined;
  if (!isRecord(root) || typeof name !== 'string' || name === '') {
    throw new InvalidArgumentError('Encoded command has no <name> element', 'cmd', encoded);
  }

  const nodes = Array.isArray(root.p) ? root.p.filter(isRecord) : [];
  const params = nodes.map((p): CommandParam => {
    const paramName = attribute(p, 'name') ?? '';
    switch (attribute(p, 'type')) {
      case 'cdata':
        return cdata(paramName, cdataBody(p));
      case 'dec':
        return dec(paramName, Number(attribute(p, 'val')));
      default:
        return str(paramName, attribute(p, 'val') ?? '');
    }
  });

  return { name, params };
}
