/**
 * Field resolution: which struct fields appear on the wire, under which name.
 *
 * Fields are collected breadth first, one embedding depth at a time. Among
 * fields sharing a name only those at the smallest depth compete; a single
 * tagged one wins, otherwise the name is dropped. Survivors keep declaration
 * order, with promoted fields in the position of the struct that embeds them.
 */

import { debug } from './logger.js';
import { indirect, type StructType, type TypeDescriptor } from './types.js';

/** One hop along a field path: the host property and its declared type. */
export interface FieldStep {
  readonly prop: string;
  readonly type: TypeDescriptor;
}

export interface PlanField {
  readonly name: string;
  readonly path: readonly FieldStep[];
  /** Declaration index at each depth; orders the plan. */
  readonly index: readonly number[];
  readonly tagged: boolean;
  readonly omitEmpty: boolean;
  /** Scalar written inside a JSON string (`string` option) */
  readonly quoted: boolean;
  readonly type: TypeDescriptor;
  readonly depth: number;
}

export interface FieldPlan {
  readonly struct: StructType;
  readonly fields: readonly PlanField[];
  readonly byName: ReadonlyMap<string, PlanField>;
  /** Lower-cased names, for keys that only match ignoring case. */
  readonly byFoldedName: ReadonlyMap<string, PlanField>;
}

export interface FieldTag {
  name: string;
  omitEmpty: boolean;
  string: boolean;
}

/** Split `"name,opt,opt"`; unknown options are ignored. */
export function parseTag(tag: string): FieldTag {
  const [name = '', ...opts] = tag.split(',');
  return { name, omitEmpty: opts.includes('omitempty'), string: opts.includes('string') };
}

const VALID_TAG = /^[\p{L}\p{Nd}!#$%&()*+\-./:;<=>?@[\]^_{|}~ ]+$/u;

/** Quotes and backslashes are reserved; other punctuation is allowed in a name. */
export function isValidTag(name: string): boolean {
  return VALID_TAG.test(name);
}

const QUOTABLE = new Set<TypeDescriptor['kind']>(['bool', 'int', 'bigint', 'float', 'string']);

interface Pending {
  struct: StructType;
  path: FieldStep[];
  index: number[];
}

function compareIndex(a: readonly number[], b: readonly number[]): number {
  for (let i = 0; i < Math.min(a.length, b.length); i++) {
    if (a[i] !== b[i]) return a[i]! - b[i]!;
  }
  return a.length - b.length;
}

function collect(root: StructType): PlanField[] {
  const fields: PlanField[] = [];
  let next: Pending[] = [{ struct: root, path: [], index: [] }];
  let nextCount = new Map<StructType, number>();
  const visited = new Set<StructType>();

  while (next.length > 0) {
    const current = next;
    const count = nextCount;
    next = [];
    nextCount = new Map();

    for (const f of current) {
      if (visited.has(f.struct)) continue;
      visited.add(f.struct);

      f.struct.fields.forEach((decl, i) => {
        const hidden = decl.exported === false;
        const ft = indirect(decl.type);
        if (decl.embedded) {
          if (hidden && ft.kind !== 'struct') return;
        } else if (hidden) {
          return;
        }
        const tag = decl.tag ?? '';
        if (tag === '-') return;
        const parsed = parseTag(tag);
        const name = isValidTag(parsed.name) ? parsed.name : '';
        const path = [...f.path, { prop: decl.name, type: decl.type }];
        const index = [...f.index, i];

        if (name !== '' || !decl.embedded || ft.kind !== 'struct') {
          const field: PlanField = {
            name: name || decl.name,
            path,
            index,
            tagged: name !== '',
            omitEmpty: parsed.omitEmpty,
            quoted: parsed.string && QUOTABLE.has(ft.kind),
            type: decl.type,
            depth: index.length,
          };
          fields.push(field);
          // the struct was embedded more than once at this level; a second
          // copy makes the name collide with itself and drop out
          if ((count.get(f.struct) ?? 0) > 1) fields.push(field);
          return;
        }

        const seen = (nextCount.get(ft) ?? 0) + 1;
        nextCount.set(ft, seen);
        if (seen === 1) next.push({ struct: ft, path, index });
      });
    }
  }
  return fields;
}

/** Pick the field that owns a contested name, if any does. */
function dominantField(group: PlanField[]): PlanField | undefined {
  const [first, second] = group;
  if (second !== undefined && first!.depth === second.depth && first!.tagged === second.tagged) {
    return undefined;
  }
  return first;
}

function resolve(fields: PlanField[]): PlanField[] {
  fields.sort((a, b) => {
    if (a.name !== b.name) return a.name < b.name ? -1 : 1;
    if (a.depth !== b.depth) return a.depth - b.depth;
    if (a.tagged !== b.tagged) return a.tagged ? -1 : 1;
    return compareIndex(a.index, b.index);
  });
  const out: PlanField[] = [];
  for (let i = 0; i < fields.length; ) {
    const name = fields[i]!.name;
    let end = i + 1;
    while (end < fields.length && fields[end]!.name === name) end++;
    const winner = end - i === 1 ? fields[i] : dominantField(fields.slice(i, end));
    if (winner) out.push(winner);
    i = end;
  }
  return out.sort((a, b) => compareIndex(a.index, b.index));
}

export function buildFieldPlan(struct: StructType): FieldPlan {
  const fields = resolve(collect(struct));
  const byName = new Map<string, PlanField>();
  const byFoldedName = new Map<string, PlanField>();
  for (const f of fields) {
    byName.set(f.name, f);
    const folded = f.name.toLowerCase();
    if (!byFoldedName.has(folded)) byFoldedName.set(folded, f);
  }
  debug('field plan %s: %s', struct.name, fields.map((f) => f.name).join(',') || '(none)');
  return { struct, fields, byName, byFoldedName };
}

const plans = new WeakMap<StructType, FieldPlan>();

/**
 * Cached plan for a struct type. Building is pure, so a plan built twice is
 * only wasted work; the first one stored is kept.
 */
export function fieldPlan(struct: StructType): FieldPlan {
  const cached = plans.get(struct);
  if (cached) return cached;
  const plan = buildFieldPlan(struct);
  if (!plans.has(struct)) plans.set(struct, plan);
  return plans.get(struct) ?? plan;
}
