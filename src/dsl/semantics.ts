import type { CstNode, IToken } from 'chevrotain';
import type { Diagnostic } from '../core/types.js';
import { errorAtSpan, errorAtToken } from '../core/errorBuilder.js';
import type { Clause, MachineSource, NameRef, StatePattern, TargetSpec } from './ast.js';
import { childNodes, childTokens, firstChildNode, nameRef, nodeSpan, nodeText, tokenSpan } from './cst-utils.js';

export const METADATA_KEYS = ['name', 'derive_states', 'derive_events', 'transitions'] as const;
type MetadataKey = typeof METADATA_KEYS[number];

function isMetadataKey(key: string): key is MetadataKey {
  return (METADATA_KEYS as readonly string[]).includes(key);
}

const VALUE_SHAPE: Record<MetadataKey, { rule: 'Identifier' | 'deriveList' | 'transitionsBlock'; example: string }> = {
  name: { rule: 'Identifier', example: 'name: Player' },
  derive_states: { rule: 'deriveList', example: 'derive_states: [Debug, Clone, PartialEq, Eq]' },
  derive_events: { rule: 'deriveList', example: 'derive_events: [Debug, Clone]' },
  transitions: { rule: 'transitionsBlock', example: 'transitions: { *Idle + Start = Running }' },
};

type Ctx = { text: string; errors: Diagnostic[] };

function valueShape(entry: CstNode): 'Identifier' | 'deriveList' | 'transitionsBlock' {
  if (firstChildNode(entry, 'deriveList')) return 'deriveList';
  if (firstChildNode(entry, 'transitionsBlock')) return 'transitionsBlock';
  return 'Identifier';
}

function readStatePattern(node: CstNode): { pattern: StatePattern; star?: IToken } {
  const star = childTokens(node, 'Star')[0];
  const wildcard = childTokens(node, 'Underscore')[0];
  if (wildcard) {
    return { pattern: { kind: 'wildcard', span: tokenSpan(wildcard) }, star };
  }
  const names = childTokens(node, 'Identifier')
    .sort((a, b) => a.startOffset - b.startOffset)
    .map(nameRef);
  return { pattern: { kind: 'states', names }, star };
}

function readTarget(clause: CstNode): TargetSpec {
  const target = firstChildNode(clause, 'target');
  if (!target) return { kind: 'same', implicit: true };
  const underscore = childTokens(target, 'Underscore')[0];
  if (underscore) return { kind: 'same', implicit: false, span: tokenSpan(underscore) };
  const ident = childTokens(target, 'Identifier')[0];
  if (!ident) return { kind: 'same', implicit: true };
  return { kind: 'state', name: nameRef(ident) };
}

function readClauses(block: CstNode, ctx: Ctx): { clauses: Clause[]; stars: { clause: Clause; star: IToken }[] } {
  const clauses: Clause[] = [];
  const stars: { clause: Clause; star: IToken }[] = [];
  childNodes(block, 'clause').forEach((node, index) => {
    const patternNode = firstChildNode(node, 'statePattern');
    const eventNode = firstChildNode(node, 'eventPattern');
    if (!patternNode || !eventNode) return;
    const { pattern, star } = readStatePattern(patternNode);
    const events = childTokens(eventNode, 'Identifier')
      .sort((a, b) => a.startOffset - b.startOffset)
      .map(nameRef);
    const clause: Clause = {
      index,
      initial: !!star,
      source: pattern,
      events,
      target: readTarget(node),
      text: nodeText(node, ctx.text),
      span: nodeSpan(node),
    };
    clauses.push(clause);
    if (star) stars.push({ clause, star });
  });
  return { clauses, stars };
}

function checkInitialMarkers(block: CstNode, clauses: Clause[], stars: { clause: Clause; star: IToken }[], ctx: Ctx): { clause: Clause; initial: NameRef } | undefined {
  for (const { clause, star } of stars) {
    if (clause.source.kind === 'wildcard') {
      ctx.errors.push(errorAtToken(star, 'InitialStateError', 'FSM-INITIAL-WILDCARD',
        "The wildcard source '_' cannot be the initial state.", {
          hint: "Mark a concrete state instead: *Idle + Start = Running",
          clause: clause.text,
        }));
    }
  }
  const concrete = stars.filter((s) => s.clause.source.kind === 'states');
  if (concrete.length > 1) {
    const first = concrete[0];
    for (const extra of concrete.slice(1)) {
      ctx.errors.push(errorAtToken(extra.star, 'InitialStateError', 'FSM-INITIAL-MULTIPLE',
        `Only one clause may be marked initial; '${first.clause.text}' already is.`, {
          hint: "Remove the extra '*' so a single clause carries the initial marker.",
          clause: extra.clause.text,
        }));
    }
  }
  if (stars.length === 0 && clauses.length > 0) {
    const first = clauses[0];
    ctx.errors.push(errorAtSpan(nodeSpan(block), 'InitialStateError', 'FSM-INITIAL-MISSING',
      'No initial state: exactly one clause must be marked with a leading \'*\'.', {
        hint: `Example: *${first.source.kind === 'states' ? first.source.names[0].name : 'Idle'} + ...`,
        length: 1,
      }));
  }
  if (stars.length !== 1) return undefined;
  const { clause } = stars[0];
  if (clause.source.kind !== 'states') return undefined;
  return { clause, initial: clause.source.names[0] };
}

function readDerives(entry: CstNode): NameRef[] {
  const list = firstChildNode(entry, 'deriveList');
  return list ? childTokens(list, 'Identifier').map(nameRef) : [];
}

export function analyzeMachine(cst: CstNode, text: string): { machine?: MachineSource; errors: Diagnostic[] } {
  const ctx: Ctx = { text, errors: [] };
  const seen = new Map<MetadataKey, IToken>();
  let namespace: NameRef | undefined;
  let deriveStates: NameRef[] | undefined;
  let deriveEvents: NameRef[] | undefined;
  let block: CstNode | undefined;

  for (const entry of childNodes(cst, 'entry')) {
    const [keyTok, valueTok] = childTokens(entry, 'Identifier').sort((a, b) => a.startOffset - b.startOffset);
    if (!keyTok) continue;
    const key = keyTok.image;
    if (!isMetadataKey(key)) {
      ctx.errors.push(errorAtToken(keyTok, 'SyntaxError', 'FSM-META-UNKNOWN',
        `Unknown key '${key}'. Expected one of: ${METADATA_KEYS.join(', ')}.`, {
          hint: "Transitions go inside the block: transitions: { *Idle + Start = Running }",
        }));
      continue;
    }
    if (seen.has(key)) {
      ctx.errors.push(errorAtToken(keyTok, 'SyntaxError', 'FSM-META-DUPLICATE',
        `'${key}' is given more than once.`, { hint: `Keep a single '${key}:' entry.` }));
      continue;
    }
    seen.set(key, keyTok);
    const shape = VALUE_SHAPE[key];
    if (valueShape(entry) !== shape.rule) {
      ctx.errors.push(errorAtToken(keyTok, 'SyntaxError', 'FSM-META-VALUE',
        `Unexpected value for '${key}'.`, { hint: `Example: ${shape.example}` }));
      continue;
    }
    switch (key) {
      case 'name':
        if (valueTok) namespace = nameRef(valueTok);
        break;
      case 'derive_states':
        deriveStates = readDerives(entry);
        break;
      case 'derive_events':
        deriveEvents = readDerives(entry);
        break;
      case 'transitions':
        block = firstChildNode(entry, 'transitionsBlock');
        break;
    }
  }

  if (!block) {
    if (!seen.has('transitions')) {
      ctx.errors.push(errorAtSpan(nodeSpan(cst), 'SyntaxError', 'FSM-TRANSITIONS-MISSING',
        "Missing 'transitions' block.", { hint: 'Add: transitions: { *Idle + Start = Running }', length: 1 }));
    }
    return { errors: ctx.errors };
  }

  const { clauses, stars } = readClauses(block, ctx);
  if (clauses.length === 0) {
    ctx.errors.push(errorAtSpan(nodeSpan(block), 'SyntaxError', 'FSM-TRANSITIONS-EMPTY',
      "The 'transitions' block is empty.", { hint: 'Add at least one clause: *Idle + Start = Running' }));
    return { errors: ctx.errors };
  }

  const marked = checkInitialMarkers(block, clauses, stars, ctx);
  if (ctx.errors.length > 0 || !marked) return { errors: ctx.errors };

  return {
    machine: { namespace, deriveStates, deriveEvents, clauses, initialClause: marked.clause, initial: marked.initial },
    errors: ctx.errors,
  };
}
