// I release this code to the public domain under the
// Creative Commons "CC0 1.0 Universal" Public Domain Dedication:
//
// http://creativecommons.org/publicdomain/zero/1.0/

import {axiom} from './axioms';
import {formatterm, Term} from './term';
import {Failed, InferenceStep, Proof} from './verifier';

function formatstep(step: InferenceStep): string {
  switch (step.tag) {
    case 'AxiomInstantiation': {
      const [a, b, c] = step.terms;
      return 'Axiom ' + step.axiomIndex + ' ' + formatterm(axiom(step.axiomIndex))
        + '; terms A = ' + formatterm(a) + ', B = ' + formatterm(b) + ', C = ' + formatterm(c);
    }
    case 'ModusPonens':
      return 'Inferred from ' + step.implicationLine + ' using ' + step.premiseLine;
  }
}

// "trace" must be the trace of a successful verification of "proof".
export function formatproof(proof: Proof, trace: readonly Term[]): string {
  const lines: string[] = [
    'Goal is ' + formatterm(proof.goal),
    'Proof is:'
  ];

  for (let n = 0; n < proof.steps.length; ++n) {
    lines.push(n + ': ' + formatterm(trace[n]) + ' (' + formatstep(proof.steps[n]) + ')');
  }

  lines.push('Q.E.D.');
  return lines.join('\n');
}

export function formatfailure(proof: Proof, failure: Failed): string {
  if (failure.reason === 'GoalNotDerived') {
    return 'Goal ' + formatterm(proof.goal) + ' not derived';
  }
  return 'Step ' + failure.atStep + ': ' + failure.message;
}
