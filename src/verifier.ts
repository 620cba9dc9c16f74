// I release this code to the public domain under the
// Creative Commons "CC0 1.0 Universal" Public Domain Dedication:
//
// http://creativecommons.org/publicdomain/zero/1.0/
//
// Proof verification. A proof is replayed one step at a time; each step
// appends exactly one formula to the trace. Verification stops at the
// first invalid step.

import {META_A, META_B, META_C, axiom, isaxiomindex} from './axioms';
import {Term, containsmeta, formatterm, substitutemeta, termsequal} from './term';

export interface AxiomInstantiation {
  readonly tag: 'AxiomInstantiation';
  readonly axiomIndex: number;
  // Substituted for A, B and C respectively
  readonly terms: readonly [Term, Term, Term];
}

export interface ModusPonens {
  readonly tag: 'ModusPonens';
  readonly implicationLine: number;
  readonly premiseLine: number;
}

export type InferenceStep = AxiomInstantiation | ModusPonens;

export interface Proof {
  readonly goal: Term;
  readonly steps: readonly InferenceStep[];
}

export type FailureReason =
  | 'UnknownAxiom'
  | 'MetaVariableInTerm'
  | 'DanglingReference'
  | 'NotAnImplication'
  | 'PremiseMismatch'
  | 'GoalNotDerived';

export interface Derived {
  readonly tag: 'Derived';
  readonly trace: readonly Term[];
}

export interface Failed {
  readonly tag: 'Failed';
  readonly reason: FailureReason;
  readonly atStep: number;
  readonly message: string;
}

export type VerificationResult = Derived | Failed;

export function axiominstantiation(axiomIndex: number, a: Term, b: Term, c: Term): AxiomInstantiation {
  return Object.freeze({tag: 'AxiomInstantiation', axiomIndex, terms: Object.freeze([a, b, c] as const)});
}

export function modusponens(implicationLine: number, premiseLine: number): ModusPonens {
  return Object.freeze({tag: 'ModusPonens', implicationLine, premiseLine});
}

export function makeproof(goal: Term, steps: readonly InferenceStep[]): Proof {
  return Object.freeze({goal, steps: Object.freeze([...steps])});
}

function failed(reason: FailureReason, atStep: number, message: string): Failed {
  return {tag: 'Failed', reason, atStep, message};
}

function isline(line: number, trace: Term[]): boolean {
  return Number.isInteger(line) && line >= 0 && line < trace.length;
}

// Apply one step to the trace. Returns the new line, or the failure.
function applystep(step: InferenceStep, n: number, trace: Term[]): Term | Failed {
  switch (step.tag) {
    case 'AxiomInstantiation': {
      if (!isaxiomindex(step.axiomIndex)) {
        return failed('UnknownAxiom', n, 'Axiom ' + step.axiomIndex + ' does not exist');
      }

      const [a, b, c] = step.terms;
      for (const term of step.terms) {
        if (containsmeta(term)) {
          return failed('MetaVariableInTerm', n, 'Term ' + formatterm(term) + ' contains a metavariable');
        }
      }

      let result: Term = axiom(step.axiomIndex);
      result = substitutemeta(result, META_A, a);
      result = substitutemeta(result, META_B, b);
      result = substitutemeta(result, META_C, c);
      return result;
    }
    case 'ModusPonens': {
      const {implicationLine, premiseLine} = step;

      if (!isline(implicationLine, trace) || !isline(premiseLine, trace)) {
        return failed('DanglingReference', n,
          'Modus ponens refers to line ' + (isline(implicationLine, trace) ? premiseLine : implicationLine)
          + ' which has not been derived');
      }

      const impl: Term = trace[implicationLine];
      if (impl.tag !== 'Implication') {
        return failed('NotAnImplication', n, 'Line ' + implicationLine + ' is not an implication');
      }

      const prem: Term = trace[premiseLine];
      if (!termsequal(impl.premise, prem)) {
        return failed('PremiseMismatch', n,
          'Line ' + premiseLine + ' does not match the premise of line ' + implicationLine);
      }

      return impl.conclusion;
    }
    default: {
      const unknown: never = step;
      throw new Error('Unknown inference step ' + JSON.stringify(unknown));
    }
  }
}

function replay(proof: Proof): Term[] | Failed {
  const trace: Term[] = [];
  for (let n = 0; n < proof.steps.length; ++n) {
    const line = applystep(proof.steps[n], n, trace);
    if (line.tag === 'Failed') {
      return line;
    }
    trace.push(line);
  }
  return trace;
}

export function verifyproof(proof: Proof): VerificationResult {
  const trace = replay(proof);
  if (!Array.isArray(trace)) {
    return trace;
  }

  if (!trace.some((line) => termsequal(line, proof.goal))) {
    return failed('GoalNotDerived', proof.steps.length, 'Goal ' + formatterm(proof.goal) + ' is never derived');
  }

  return {tag: 'Derived', trace};
}

// The formulas derived by the proof's steps, or null if a step is invalid.
// The goal isn't consulted.
export function statements(proof: Proof): Term[] | null {
  const trace = replay(proof);
  return Array.isArray(trace) ? trace : null;
}

export function isproved(proof: Proof): boolean {
  return verifyproof(proof).tag === 'Derived';
}
