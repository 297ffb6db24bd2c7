import type { PartDefinition, PartInstance } from '../core/song.js';
import { normalizePartName } from '../core/song.js';
import { isBareKindWord, kindForLabel } from './dialects.js';
import { addDiagnostic, type ParseContext } from './parse-context.js';
import type { DirectiveValue, GroupedSong } from './parse-parts.js';

/** A repeat directive value split into its parts. */
export interface ReferenceSpec {
  target: string;
  repeat?: number;
  override?: string;
}

const REPEAT_COUNT_RE = /^(.*?)\s*(?:[x×]\s*([1-9]\d*)|([1-9]\d*)\s*[x×])$/i;

/** Split `target [xN | N x] [: override]`. */
export function parseReferenceValue(value: string): ReferenceSpec {
  const colon = value.indexOf(':');
  const head = (colon >= 0 ? value.slice(0, colon) : value).trim();
  const override = colon >= 0 ? value.slice(colon + 1).trim() : '';

  const spec: ReferenceSpec = { target: head };
  const counted = REPEAT_COUNT_RE.exec(head);
  const count = counted?.[2] ?? counted?.[3];
  if (counted && count !== undefined && (counted[1] ?? '').length > 0) {
    spec.target = counted[1] ?? head;
    const repeat = Number(count);
    if (repeat > 1) {
      spec.repeat = repeat;
    }
  }
  if (override.length > 0) {
    spec.override = override;
  }
  return spec;
}

/**
 * Find the definition a reference target names.
 * Exact (normalized) names win; a bare kind word falls back to the definitions of that kind.
 */
export function resolveTarget(
  target: string,
  definitions: readonly PartDefinition[],
  ctx: ParseContext,
  position: { line: number; column: number }
): PartDefinition | undefined {
  const wanted = normalizePartName(target);
  const exact = definitions.find((definition) => normalizePartName(definition.name) === wanted);
  if (exact) {
    return exact;
  }

  const kind = isBareKindWord(target) ? kindForLabel(target) : undefined;
  const candidates = kind ? definitions.filter((definition) => definition.kind === kind) : [];
  const [first, ...others] = candidates;

  if (!first) {
    addDiagnostic(
      ctx,
      'UNRESOLVED_REFERENCE',
      'error',
      'structural-error',
      `Reference '${target}' does not name any part; it is dropped.`,
      position
    );
    return undefined;
  }

  if (others.length > 0) {
    addDiagnostic(
      ctx,
      'AMBIGUOUS_REFERENCE',
      'warning',
      'structural-warning',
      `Reference '${target}' matches ${candidates.length} parts (${candidates
        .map((candidate) => candidate.name)
        .join(', ')}); using '${first.name}'.`,
      position
    );
  }
  return first;
}

function instanceFor(definition: PartDefinition, spec: ReferenceSpec): PartInstance {
  return {
    name: definition.name,
    ...(spec.repeat !== undefined ? { repeat: spec.repeat } : {}),
    ...(spec.override !== undefined ? { override: spec.override } : {})
  };
}

/** Resolve one directive value (repeat hint or order entry) to an instance. */
function resolveReference(
  entry: DirectiveValue,
  definitions: readonly PartDefinition[],
  ctx: ParseContext
): PartInstance | undefined {
  const spec = parseReferenceValue(entry.value);
  const definition = resolveTarget(spec.target, definitions, ctx, entry);
  return definition ? instanceFor(definition, spec) : undefined;
}

/**
 * Build the performance order once every definition is known.
 * An order directive replaces the slots entirely; inline repeats are then reported and ignored.
 */
export function resolvePerformanceOrder(
  grouped: GroupedSong,
  definitions: readonly PartDefinition[],
  ctx: ParseContext
): PartInstance[] {
  if (grouped.order) {
    for (const slot of grouped.slots) {
      if (slot.type === 'reference') {
        addDiagnostic(
          ctx,
          'REPEAT_IGNORED_BY_ORDER',
          'warning',
          'structural-warning',
          `Repeat '${slot.value}' is ignored because an order directive sets the performance order.`,
          slot
        );
      }
    }

    const order = grouped.order;
    return order.value
      .split(/[,;]/)
      .map((value) => value.trim())
      .filter((value) => value.length > 0)
      .flatMap((value) => resolveReference({ ...order, value }, definitions, ctx) ?? []);
  }

  const instances: PartInstance[] = [];
  for (const slot of grouped.slots) {
    if (slot.type === 'reference') {
      const instance = resolveReference(slot, definitions, ctx);
      if (instance) {
        instances.push(instance);
      }
      continue;
    }

    const part = grouped.parts[slot.part];
    if (part) {
      instances.push({ name: part.name });
    }
  }
  return instances;
}

/** Warn about unused definitions and fall back to definition order when nothing is left. */
export function validatePerformanceOrder(
  definitions: readonly PartDefinition[],
  order: PartInstance[],
  ctx: ParseContext
): PartInstance[] {
  if (definitions.length > 0 && order.length === 0) {
    addDiagnostic(
      ctx,
      'EMPTY_ORDER_FALLBACK',
      'warning',
      'structural-warning',
      'No part could be placed in the performance order; parts are played in definition order.',
      { line: definitions[0]?.sourceLine ?? 1 }
    );
    return definitions.map((definition) => ({ name: definition.name }));
  }

  const used = new Set(order.map((instance) => normalizePartName(instance.name)));
  for (const definition of definitions) {
    if (!used.has(normalizePartName(definition.name))) {
      addDiagnostic(
        ctx,
        'UNUSED_PART',
        'warning',
        'structural-warning',
        `Part '${definition.name}' is never played.`,
        { line: definition.sourceLine ?? 1 }
      );
    }
  }
  return order;
}
