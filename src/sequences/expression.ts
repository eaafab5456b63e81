/**
 * Condition Expressions
 *
 * Grammar, loosest binding first:
 *   expr    := and ( '||' and )*
 *   and     := unary ( '&&' unary )*
 *   unary   := '!' unary | atom
 *   atom    := 'flag:' name [ ( '==' | '!=' ) literal ]
 *            | <anything else>            -> evaluates to true
 *
 * No parentheses, no arithmetic. An unrecognized atom is true so an
 * expression the engine does not understand never blocks a run.
 */

import { FlagSource } from '../flags/flag-store';

export type ConditionNode =
  | { type: 'or'; operands: ConditionNode[] }
  | { type: 'and'; operands: ConditionNode[] }
  | { type: 'not'; operand: ConditionNode }
  | { type: 'flag'; name: string }
  | { type: 'compare'; name: string; op: '==' | '!='; literal: string }
  | { type: 'unknown'; text: string };

const FLAG_PREFIX = 'flag:';

export function parseCondition(text: string): ConditionNode {
  const alternatives = text.split('||').map(part => parseConjunction(part));
  return alternatives.length === 1 ? alternatives[0] : { type: 'or', operands: alternatives };
}

function parseConjunction(text: string): ConditionNode {
  const operands = text.split('&&').map(part => parseUnary(part));
  return operands.length === 1 ? operands[0] : { type: 'and', operands };
}

function parseUnary(text: string): ConditionNode {
  let rest = text.trim();
  let negations = 0;
  while (rest.startsWith('!')) {
    negations++;
    rest = rest.slice(1).trim();
  }
  let node = parseAtom(rest);
  for (let i = 0; i < negations; i++) {
    node = { type: 'not', operand: node };
  }
  return node;
}

function parseAtom(text: string): ConditionNode {
  if (text.slice(0, FLAG_PREFIX.length).toLowerCase() !== FLAG_PREFIX) {
    return { type: 'unknown', text };
  }
  const body = text.slice(FLAG_PREFIX.length);

  for (const op of ['==', '!='] as const) {
    const at = body.indexOf(op);
    if (at !== -1) {
      const name = body.slice(0, at).trim();
      if (!name) return { type: 'unknown', text };
      return { type: 'compare', name, op, literal: body.slice(at + op.length).trim() };
    }
  }

  const name = body.trim();
  return name ? { type: 'flag', name } : { type: 'unknown', text };
}

/** Evaluate left to right with short-circuit && and || */
export function evaluateNode(node: ConditionNode, flags: FlagSource): boolean {
  switch (node.type) {
    case 'or':
      return node.operands.some(operand => evaluateNode(operand, flags));
    case 'and':
      return node.operands.every(operand => evaluateNode(operand, flags));
    case 'not':
      return !evaluateNode(node.operand, flags);
    case 'flag':
      return flags.getFlag(node.name);
    case 'compare': {
      const equal = String(flags.getFlag(node.name)).toLowerCase() === node.literal.toLowerCase();
      return node.op === '==' ? equal : !equal;
    }
    case 'unknown':
      return true;
  }
}

export function evaluateCondition(text: string, flags: FlagSource): boolean {
  return evaluateNode(parseCondition(text), flags);
}
