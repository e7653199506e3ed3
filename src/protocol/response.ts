import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { ProtocolError } from '../errors/wam-errors.js';
import type { Endpoint } from './command.js';

const responseParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  cdataPropName: '__cdata',
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Text content of a parsed node: plain text, a CDATA section, or text
 * alongside attributes. Returns undefined for anything else.
 */
function nodeText(node: unknown): string | undefined {
  if (typeof node === 'string') {
    return node;
  }
  if (isRecord(node)) {
    const cdataNode = node.__cdata;
    if (typeof cdataNode === 'string') {
      return cdataNode;
    }
    if (Array.isArray(cdataNode)) {
      return cdataNode.filter((part): part is string => typeof part === 'string').join('');
    }
    const text = node['#text'];
    if (typeof text === 'string') {
      return text;
    }
    // Empty element that only carries attributes
    if (Object.keys(node).every(key => key.startsWith('@_'))) {
      return '';
    }
  }
  return undefined;
}

/**
 * The <response> element of a speaker reply, with typed field accessors.
 * Accessors never substitute defaults: a missing field is a ProtocolError.
 */
export class WamReply {
  constructor(
    public readonly command: string,
    public readonly fields: Readonly<Record<string, unknown>>,
    public readonly rawResponse: string
  ) {}

  has(field: string): boolean {
    return field in this.fields;
  }

  text(field: string): string {
    const value = nodeText(this.fields[field]);
    if (value === undefined) {
      throw new ProtocolError(`response has no <${field}> field`, this.command, this.rawResponse);
    }
    return value;
  }

  optionalText(field: string): string | undefined {
    return this.has(field) ? this.text(field) : undefined;
  }

  integer(field: string): number {
    const text = this.text(field).trim();
    if (!/^-?\d+$/.test(text)) {
      throw new ProtocolError(`<${field}> is not an integer: "${text}"`, this.command, this.rawResponse);
    }
    return parseInt(text, 10);
  }

  optionalInteger(field: string): number | undefined {
    return this.has(field) ? this.integer(field) : undefined;
  }
}

/**
 * Parse a raw reply body into its <response> element.
 * Expected shape: <UIC|CPM>...<response result="ok">fields</response></UIC|CPM>
 */
export function parseResponse(endpoint: Endpoint, commandName: string, body: string): WamReply {
  if (body.trim() === '') {
    throw new ProtocolError('empty response body', commandName, body);
  }

  const validation = XMLValidator.validate(body);
  if (validation !== true) {
    throw new ProtocolError(
      `malformed XML (line ${validation.err.line}: ${validation.err.msg})`,
      commandName,
      body
    );
  }

  const parsed: unknown = responseParser.parse(body);
  const root = isRecord(parsed) ? parsed[endpoint] : undefined;
  if (!isRecord(root)) {
    throw new ProtocolError(`response has no <${endpoint}> root element`, commandName, body);
  }

  if (!('response' in root)) {
    throw new ProtocolError('response has no <response> element', commandName, body);
  }

  const response = root.response;
  const fields = isRecord(response) ? response : {};
  const result = fields['@_result'];
  if (result !== undefined && result !== 'ok') {
    throw new ProtocolError(`device reported failure (result="${String(result)}")`, commandName, body);
  }

  return new WamReply(commandName, fields, body);
}
