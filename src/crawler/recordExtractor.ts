import { FIELD_RULES, type FieldKind, type FieldRule } from './fieldRules';
import { collapseWhitespace, splitLines } from './text';
import type { DocumentSnapshot, ExtractionResult, FieldValue, ServiceRecord } from './types';

const TEXT_NODE = 3;
const BLOCK_NODES = new Set(['DIV', 'P', 'LI', 'TR', 'UL', 'OL', 'TABLE']);
const SKIPPED_NODES = new Set(['SCRIPT', 'STYLE', 'NOSCRIPT']);

/** Text of a node with `<br>` and block boundaries kept as line breaks (jsdom has no innerText). */
export function renderText(node: Node): string {
  if (node.nodeType === TEXT_NODE) return node.nodeValue ?? '';
  if (node.nodeName === 'BR') return '\n';
  if (SKIPPED_NODES.has(node.nodeName)) return '';
  const inner = Array.from(node.childNodes, renderText).join('');
  return BLOCK_NODES.has(node.nodeName) ? `\n${inner}\n` : inner;
}

const normalizeLabel = (text: string) => collapseWhitespace(text).replace(/\s*:$/, '');

const labelKey = (text: string) => normalizeLabel(text).toLowerCase();

const readText = (cell: Element): FieldValue => collapseWhitespace(renderText(cell)) || null;

const readList = (cell: Element): FieldValue => {
  const items = splitLines(renderText(cell));
  return items.length > 0 ? items : null;
};

const readImage = (cell: Element, pageUrl: string): FieldValue => {
  const src = cell.querySelector('img')?.getAttribute('src')?.trim();
  if (!src) return null;
  try {
    return new URL(src, pageUrl).toString();
  } catch {
    return null;
  }
};

const READERS: Record<FieldKind, (cell: Element, pageUrl: string) => FieldValue> = {
  text: readText,
  list: readList,
  image: readImage,
};

// Cells outside the rule table: an image-only cell yields its src, anything else its text.
const readUnlisted = (cell: Element, pageUrl: string): FieldValue =>
  cell.querySelector('img') && !collapseWhitespace(renderText(cell))
    ? readImage(cell, pageUrl)
    : readText(cell);

export const isEmptyValue = (v: FieldValue | undefined) =>
  v === undefined || v === null || (Array.isArray(v) ? v.length === 0 : v.trim() === '');

// Labels come from the page, so they are defined as own properties: `__proto__` or
// `constructor` must land in the record like any other label.
const setField = (record: ServiceRecord, field: string, value: FieldValue) => {
  Object.defineProperty(record, field, { value, enumerable: true, writable: true, configurable: true });
};

type LabelledCell = { label: string; cell: Element };

export type RecordExtractorOptions = {
  requiredFields: string[];
  keepUnlistedFields?: boolean;
  rules?: FieldRule[];
  labelSelector?: string;
  valueSelector?: string;
};

export class RecordExtractor {
  private readonly rules: FieldRule[];
  private readonly labelSelector: string;
  private readonly valueSelector: string;

  constructor(private readonly opts: RecordExtractorOptions) {
    this.rules = opts.rules ?? FIELD_RULES;
    this.labelSelector = opts.labelSelector ?? '.cbFormLabelCell';
    this.valueSelector = opts.valueSelector ?? '.cbFormDataCell';
  }

  extract(snapshot: DocumentSnapshot, url: string): ExtractionResult {
    const cells = this.labelledCells(snapshot.document);
    const byLabel = new Map<string, LabelledCell>();
    for (const c of cells) {
      const key = labelKey(c.label);
      if (!byLabel.has(key)) byLabel.set(key, c);
    }

    const record: ServiceRecord = {};
    const claimed = new Set<string>();

    for (const rule of this.rules) {
      setField(record, rule.field, this.readRule(rule, byLabel, claimed, snapshot.url));
    }

    if (this.opts.keepUnlistedFields ?? true) {
      for (const { label, cell } of cells) {
        const key = labelKey(label);
        if (claimed.has(key) || Object.hasOwn(record, label)) continue;
        claimed.add(key);
        let value: FieldValue;
        try {
          value = readUnlisted(cell, snapshot.url);
        } catch {
          value = null;
        }
        setField(record, label, value);
      }
    }

    const missingFields = this.opts.requiredFields.filter(
      (f) => !Object.hasOwn(record, f) || isEmptyValue(record[f])
    );
    if (missingFields.length > 0) return { ok: false, failure: { url, missingFields } };
    return { ok: true, record };
  }

  private readRule(
    rule: FieldRule,
    byLabel: Map<string, LabelledCell>,
    claimed: Set<string>,
    pageUrl: string
  ): FieldValue {
    try {
      for (const label of rule.labels ?? [rule.field]) {
        const hit = byLabel.get(labelKey(label));
        if (!hit) continue;
        claimed.add(labelKey(label));
        return READERS[rule.kind](hit.cell, pageUrl);
      }
      return null;
    } catch {
      return null;
    }
  }

  // Label and data cells pair up by position, as the detail form renders them.
  private labelledCells(document: Document): LabelledCell[] {
    const labels = Array.from(document.querySelectorAll(this.labelSelector));
    const values = Array.from(document.querySelectorAll(this.valueSelector));
    const out: LabelledCell[] = [];
    for (let i = 0; i < Math.min(labels.length, values.length); i++) {
      const label = normalizeLabel(renderText(labels[i]));
      if (label) out.push({ label, cell: values[i] });
    }
    return out;
  }
}
