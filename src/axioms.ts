// I release this code to the public domain under the
// Creative Commons "CC0 1.0 Universal" Public Domain Dedication:
//
// http://creativecommons.org/publicdomain/zero/1.0/

import {parseterm} from './parser';
import {Term} from './term';

export const META_A = 'A'.charCodeAt(0);
export const META_B = 'B'.charCodeAt(0);
export const META_C = 'C'.charCodeAt(0);

function schema(text: string): Term {
  const result = parseterm(text);
  if (!result.ok) {
    throw new Error('Bad axiom schema ' + text + ': ' + result.message);
  }
  return result.term;
}

const axioms: readonly Term[] = Object.freeze([
  schema('>A>BA'),          // A -> (B -> A)
  schema('>>A>BC>>AB>AC'),  // (A -> (B -> C)) -> ((A -> B) -> (A -> C))
  schema('>>>ABAA'),        // ((A -> B) -> A) -> A
  schema('>!A')             // ! -> A
]);

export const axiomcount: number = axioms.length;

export function isaxiomindex(index: number): boolean {
  return Number.isInteger(index) && index >= 0 && index < axioms.length;
}

export function axiom(index: number): Term {
  if (!isaxiomindex(index)) {
    throw new RangeError('No axiom with index ' + index);
  }
  return axioms[index];
}
