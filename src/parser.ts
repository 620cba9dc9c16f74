// I release this code to the public domain under the
// Creative Commons "CC0 1.0 Universal" Public Domain Dedication:
//
// http://creativecommons.org/publicdomain/zero/1.0/
//
// Formulas are written in prefix notation:
//
//   !        contradiction
//   a .. z   variable
//   A .. Z   metavariable
//   >PQ      P -> Q (any other character works as the implication operator)

import {Term, containsmeta, contradiction, implication, metavariable, variable} from './term';

export type ParseResult =
  | {ok: true; term: Term}
  | {ok: false; message: string};

function islower(ch: string): boolean {
  return ch >= 'a' && ch <= 'z';
}

function isupper(ch: string): boolean {
  return ch >= 'A' && ch <= 'Z';
}

export function parseterm(text: string): ParseResult {
  // One entry per implication still being read: its premise once that is
  // complete, undefined before.
  const pending: (Term | undefined)[] = [];
  let pos = 0;

  while (true) {
    if (pos >= text.length) {
      return {ok: false, message: 'Unexpected end of formula'};
    }

    const ch = text[pos++];
    let term: Term;

    if (ch === '!') {
      term = contradiction;
    } else if (islower(ch)) {
      term = variable(ch.charCodeAt(0));
    } else if (isupper(ch)) {
      term = metavariable(ch.charCodeAt(0));
    } else {
      pending.push(undefined);
      continue;
    }

    // Close every implication this term completes
    let complete = true;
    while (pending.length) {
      const premise = pending[pending.length - 1];
      if (premise === undefined) {
        pending[pending.length - 1] = term;
        complete = false;
        break;
      }
      pending.pop();
      term = implication(premise, term);
    }

    if (complete) {
      if (pos < text.length) {
        return {ok: false, message: 'Redundant string: ' + text.slice(pos)};
      }
      return {ok: true, term};
    }
  }
}

// As parseterm, but metavariables are not allowed.
export function parseconcreteterm(text: string): ParseResult {
  const result = parseterm(text);
  if (result.ok && containsmeta(result.term)) {
    return {ok: false, message: 'Metavariable found in ' + text};
  }
  return result;
}
