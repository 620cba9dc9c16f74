// I release this code to the public domain under the
// Creative Commons "CC0 1.0 Universal" Public Domain Dedication:
//
// http://creativecommons.org/publicdomain/zero/1.0/
//
// Formulas of implicational propositional logic with a contradiction
// constant. Metavariables only ever appear inside axiom schemas.

export interface Variable {
  readonly tag: 'Variable';
  readonly id: number;
}

export interface Contradiction {
  readonly tag: 'Contradiction';
}

export interface Implication {
  readonly tag: 'Implication';
  readonly premise: Term;
  readonly conclusion: Term;
}

export interface MetaVariable {
  readonly tag: 'MetaVariable';
  readonly id: number;
}

export type Term = Variable | Contradiction | Implication | MetaVariable;

export function variable(id: number): Variable {
  return Object.freeze({tag: 'Variable', id});
}

export const contradiction: Contradiction = Object.freeze({tag: 'Contradiction'});

export function implication(premise: Term, conclusion: Term): Implication {
  return Object.freeze({tag: 'Implication', premise, conclusion});
}

export function metavariable(id: number): MetaVariable {
  return Object.freeze({tag: 'MetaVariable', id});
}

function unreachable(term: never): never {
  throw new Error('Unknown term ' + JSON.stringify(term));
}

// Replace every occurrence of metavariable "id" with "replacement".
// Subterms that don't mention the metavariable are shared, not copied.
//
// Terms may be nested deeper than the call stack allows, so these
// traversals keep their own stack rather than recursing.
export function substitutemeta(term: Term, id: number, replacement: Term): Term {
  // An implication is visited twice: once to queue its two sides, and once
  // more, "expanded", to combine their results.
  const pending: {term: Term; expanded: boolean}[] = [{term, expanded: false}];
  const done: Term[] = [];

  for (let frame = pending.pop(); frame !== undefined; frame = pending.pop()) {
    const current = frame.term;
    switch (current.tag) {
      case 'Variable':
      case 'Contradiction':
        done.push(current);
        break;
      case 'MetaVariable':
        done.push(current.id === id ? replacement : current);
        break;
      case 'Implication': {
        if (!frame.expanded) {
          pending.push({term: current, expanded: true});
          pending.push({term: current.conclusion, expanded: false});
          pending.push({term: current.premise, expanded: false});
          break;
        }
        const conclusion = done.pop();
        const premise = done.pop();
        if (premise === undefined || conclusion === undefined) {
          throw new Error('Substitution lost track of ' + formatterm(current));
        }
        if (premise === current.premise && conclusion === current.conclusion) {
          done.push(current);
        } else {
          done.push(implication(premise, conclusion));
        }
        break;
      }
      default:
        return unreachable(current);
    }
  }

  const result = done.pop();
  if (result === undefined) {
    throw new Error('Substitution lost track of ' + formatterm(term));
  }
  return result;
}

export function termsequal(a: Term, b: Term): boolean {
  const pending: [Term, Term][] = [[a, b]];

  for (let pair = pending.pop(); pair !== undefined; pair = pending.pop()) {
    const [x, y] = pair;
    if (x === y) {
      continue;
    }

    switch (x.tag) {
      case 'Variable':
        if (y.tag !== 'Variable' || x.id !== y.id) {
          return false;
        }
        break;
      case 'Contradiction':
        if (y.tag !== 'Contradiction') {
          return false;
        }
        break;
      case 'MetaVariable':
        if (y.tag !== 'MetaVariable' || x.id !== y.id) {
          return false;
        }
        break;
      case 'Implication':
        if (y.tag !== 'Implication') {
          return false;
        }
        pending.push([x.conclusion, y.conclusion]);
        pending.push([x.premise, y.premise]);
        break;
      default:
        return unreachable(x);
    }
  }

  return true;
}

export function containsmeta(term: Term): boolean {
  const pending: Term[] = [term];

  for (let current = pending.pop(); current !== undefined; current = pending.pop()) {
    switch (current.tag) {
      case 'Variable':
      case 'Contradiction':
        break;
      case 'MetaVariable':
        return true;
      case 'Implication':
        pending.push(current.conclusion);
        pending.push(current.premise);
        break;
      default:
        return unreachable(current);
    }
  }

  return false;
}

function lettername(id: number, first: string, last: string, prefix: string): string {
  if (id >= first.charCodeAt(0) && id <= last.charCodeAt(0)) {
    return String.fromCharCode(id);
  }
  return prefix + id;
}

export function formatterm(term: Term): string {
  // Terms still to print, and the punctuation between them
  const pending: (Term | string)[] = [term];
  let text = '';

  for (let item = pending.pop(); item !== undefined; item = pending.pop()) {
    if (typeof item === 'string') {
      text += item;
      continue;
    }

    switch (item.tag) {
      case 'Variable':
        text += lettername(item.id, 'a', 'z', 'v');
        break;
      case 'Contradiction':
        text += '!';
        break;
      case 'MetaVariable':
        text += lettername(item.id, 'A', 'Z', 'V');
        break;
      case 'Implication':
        pending.push(item.conclusion, ') -> ', item.premise);
        text += '(';
        break;
      default:
        return unreachable(item);
    }
  }

  return text;
}
