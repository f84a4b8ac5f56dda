/**
 * Gate condition evaluation.
 */

import { GateCondition, TriggerEvent } from '../domain/pipeline';

/** What a gate can see about the run. */
export interface GateContext {
  trigger: TriggerEvent;
  features: Record<string, boolean>;
}

function globToRegExp(pattern: string): RegExp {
  const escaped = pattern
    .split('*')
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
    .join('.*');
  return new RegExp(`^${escaped}$`);
}

export function evaluateGate(condition: GateCondition | undefined, ctx: GateContext): boolean {
  if (!condition) return true;
  switch (condition.kind) {
    case 'trigger':
      return condition.in.includes(ctx.trigger.kind);
    case 'repository':
      return ctx.trigger.repository === condition.equals;
    case 'ref':
      return globToRegExp(condition.pattern).test(ctx.trigger.ref);
    case 'base-ref':
      return ctx.trigger.baseRef !== undefined && globToRegExp(condition.pattern).test(ctx.trigger.baseRef);
    case 'feature':
      return ctx.features[condition.name] === true;
    case 'all':
      return condition.conditions.every((c) => evaluateGate(c, ctx));
    case 'any':
      return condition.conditions.some((c) => evaluateGate(c, ctx));
    case 'not':
      return !evaluateGate(condition.condition, ctx);
  }
}

/** Combine two optional gates; both must hold. */
export function combineGates(a: GateCondition | undefined, b: GateCondition | undefined): GateCondition | undefined {
  if (!a) return b;
  if (!b) return a;
  return { kind: 'all', conditions: [a, b] };
}

// Builders for readable pipeline definitions.

export const on = {
  trigger: (...kinds: TriggerEvent['kind'][]): GateCondition => ({ kind: 'trigger', in: kinds }),
  repository: (equals: string): GateCondition => ({ kind: 'repository', equals }),
  ref: (pattern: string): GateCondition => ({ kind: 'ref', pattern }),
  baseRef: (pattern: string): GateCondition => ({ kind: 'base-ref', pattern }),
  feature: (name: string): GateCondition => ({ kind: 'feature', name }),
  all: (...conditions: GateCondition[]): GateCondition => ({ kind: 'all', conditions }),
  any: (...conditions: GateCondition[]): GateCondition => ({ kind: 'any', conditions }),
  not: (condition: GateCondition): GateCondition => ({ kind: 'not', condition }),
};
