/**
 * Navigation helpers over the untyped tree fast-xml-parser produces.
 */
export type XmlNode = Record<string, unknown>;

export function isXmlNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function field(node: unknown, name: string): unknown {
  return isXmlNode(node) ? node[name] : undefined;
}

export function child(node: unknown, name: string): XmlNode | undefined {
  if (!isXmlNode(node)) return undefined;
  const value = node[name];
  return isXmlNode(value) ? value : undefined;
}

export function children(node: unknown, name: string): unknown[] {
  if (!isXmlNode(node)) return [];
  const value = node[name];
  if (value === undefined || value === null) return [];
  return Array.isArray(value) ? value : [value];
}

export function attribute(node: unknown, name: string): string | undefined {
  if (!isXmlNode(node)) return undefined;
  const value = node[`@_${name}`];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Text content of an element: a bare string for plain elements, the
 * `#text` entry when the element also carries attributes.
 */
export function textOf(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  if (isXmlNode(value)) return textOf(value['#text']);
  return '';
}

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;');
}
