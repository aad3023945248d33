/**
 * Helpers for walking documents produced by fast-xml-parser with
 * `parseTagValue: false`: every leaf is a string, or an object with
 * `#text` when the element carries attributes.
 */

export type XmlNode = Record<string, unknown>;

export function isNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function blankToNull(value: string): string | null {
  const trimmed = value.trim();
  return trimmed === '' ? null : trimmed;
}

/** Child element; repeated elements resolve to the first occurrence. */
export function child(node: XmlNode | undefined, key: string): XmlNode | undefined {
  if (!node) return undefined;
  const value = node[key];
  const first = Array.isArray(value) ? value[0] : value;
  return isNode(first) ? first : undefined;
}

/** Every occurrence of a repeated child element. */
export function children(node: XmlNode | undefined, key: string): XmlNode[] {
  if (!node) return [];
  const value = node[key];
  const list: unknown[] = Array.isArray(value) ? value : [value];
  return list.filter(isNode);
}

/** Text content of a child element, including elements that carry attributes. */
export function text(node: XmlNode | undefined, key: string): string | null {
  if (!node) return null;
  const raw = node[key];
  const value = Array.isArray(raw) ? raw[0] : raw;
  if (typeof value === 'string') return blankToNull(value);
  if (typeof value === 'number') return String(value);
  if (isNode(value)) {
    const inner = value['#text'];
    if (typeof inner === 'string') return blankToNull(inner);
    if (typeof inner === 'number') return String(inner);
  }
  return null;
}

export function numberText(node: XmlNode | undefined, key: string): number | null {
  const value = text(node, key);
  if (value === null) return null;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}
