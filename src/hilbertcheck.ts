#!/usr/bin/env node
// I release this code to the public domain under the
// Creative Commons "CC0 1.0 Universal" Public Domain Dedication:
//
// http://creativecommons.org/publicdomain/zero/1.0/
//
// This is a standalone verifier for Hilbert-style proofs in implicational
// propositional logic with ex falso. Run it with a proof file name as the
// parameter, optionally followed by the maximum number of proofs to check.
//
// Each verified proof is printed line by line. If the verifier finds an
// invalid proof, it will report it and quit. It will not attempt to check
// the remaining proofs.

import * as path from 'path';

import {formatfailure, formatproof} from './printer';
import {readprooffile} from './proofreader';
import {verifyproof} from './verifier';

export type {Term} from './term';
export {variable, contradiction, implication, metavariable, substitutemeta, termsequal, formatterm} from './term';
export {axiom, axiomcount} from './axioms';
export {parseterm, parseconcreteterm} from './parser';
export type {InferenceStep, Proof, VerificationResult, FailureReason} from './verifier';
export {
  axiominstantiation, modusponens, makeproof, verifyproof, statements, isproved
} from './verifier';
export {formatproof, formatfailure} from './printer';
export type {ProofEntry} from './proofreader';
export {readproofs, readprooffile} from './proofreader';

const EXIT_FAILURE = 1;

export function main(argv: string[]): number {
  let nProofLimit: number = Number.MAX_SAFE_INTEGER;

  if (argv.length === 3) {
    const newProofLimit = /^[0-9]+$/.test(argv[2]) ? parseInt(argv[2], 10) : 0;
    if (newProofLimit > 0) {
      nProofLimit = newProofLimit;
    } else {
      console.error('Invalid proof limit ' + argv[2]);
    }
    argv = argv.slice(0, 2);
  }

  if (argv.length !== 2) {
    console.error('Syntax: node hilbertcheck.js <filename> [<proof-limit>]');
    return EXIT_FAILURE;
  }

  const entries = readprooffile(argv[1]);
  if (entries === null) {
    return EXIT_FAILURE;
  }

  let nProofCount = 0;

  for (const {proof, index} of entries) {
    const result = verifyproof(proof);
    if (result.tag === 'Failed') {
      console.error('Proof ' + index + ': ' + formatfailure(proof, result));
      return EXIT_FAILURE;
    }

    console.log(formatproof(proof, result.trace));
    ++nProofCount;

    if (nProofCount >= nProofLimit) {
      console.log('Proof limit reached');
      break;
    }
  }

  console.log('Successfully verified ' + nProofCount + ' proofs');
  return 0;
}

// Are we being run as a program or a library?
if (process.argv.length >= 2 && path.basename(process.argv[1]) === path.basename(__filename)) {
  // We are being run as a program
  process.exitCode = main(process.argv.slice(1));
}
