import type { JsonValue, TemplateNode, TemplateSegment } from '@core/interfaces/index.js';

/** `{field}` or `{field|default}`; field names may be dotted and a default may be `{}`. */
const PLACEHOLDER = /\{([A-Za-z_][\w.]*)(?:\|((?:[^{}]|\{\})*))?\}/g;

export function parseSegments(text: string): TemplateSegment[] {
  const segments: TemplateSegment[] = [];
  let cursor = 0;
  for (const m of text.matchAll(PLACEHOLDER)) {
    const start = m.index ?? 0;
    if (start > cursor) segments.push({ kind: 'literal', text: text.slice(cursor, start) });
    segments.push(
      m[2] === undefined
        ? { kind: 'placeholder', field: m[1] }
        : { kind: 'placeholder', field: m[1], defaultValue: m[2] },
    );
    cursor = start + m[0].length;
  }
  if (cursor < text.length) segments.push({ kind: 'literal', text: text.slice(cursor) });
  return segments;
}

export function parseTemplate(content: JsonValue): TemplateNode {
  if (Array.isArray(content)) {
    return { kind: 'array', items: content.map(parseTemplate) };
  }
  if (content !== null && typeof content === 'object') {
    return {
      kind: 'object',
      entries: Object.entries(content).map(([key, value]) => ({ key, value: parseTemplate(value) })),
    };
  }
  if (typeof content === 'string') {
    const segments = parseSegments(content);
    if (segments.some((s) => s.kind === 'placeholder')) return { kind: 'text', segments };
  }
  return { kind: 'value', value: content };
}

/** Placeholder field names in document order, without duplicates. */
export function collectPlaceholders(node: TemplateNode, into: string[] = []): string[] {
  switch (node.kind) {
    case 'object':
      for (const entry of node.entries) collectPlaceholders(entry.value, into);
      break;
    case 'array':
      for (const item of node.items) collectPlaceholders(item, into);
      break;
    case 'text':
      for (const seg of node.segments) {
        if (seg.kind === 'placeholder' && !into.includes(seg.field)) into.push(seg.field);
      }
      break;
    case 'value':
      break;
  }
  return into;
}
