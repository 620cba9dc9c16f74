// I release this code to the public domain under the
// Creative Commons "CC0 1.0 Universal" Public Domain Dedication:
//
// http://creativecommons.org/publicdomain/zero/1.0/
//
// Reads proof files. A proof file is a sequence of whitespace separated
// tokens holding one or more proofs:
//
//   $( comments are delimited like this $)
//   goal >aa
//   axiom 1 a >aa a
//   axiom 0 a >aa a
//   mp 0 1
//   axiom 0 a a a
//   mp 2 3
//
// Each proof starts with "goal" followed by the formula it establishes.
// "axiom" takes an axiom index and the three formulas substituted for A, B
// and C. "mp" takes the line of an implication and the line of its premise,
// counting from 0 within the proof.
//
// If the reader finds an error, it reports it and gives up on the whole
// file.

import * as fs from 'fs';

import {parseconcreteterm} from './parser';
import {Term} from './term';
import {axiominstantiation, InferenceStep, makeproof, modusponens, Proof} from './verifier';

export class Input {
  private pos = 0;

  constructor(private readonly text: string) {}

  get(): string | null {
    if (this.pos >= this.text.length) {
      return null;
    }
    return this.text[this.pos++];
  }

  unget(): void {
    if (this.pos > 0) {
      --this.pos;
    }
  }
}

export interface ProofEntry {
  proof: Proof;
  // Position of the proof in the file, counting from 1
  index: number;
}

export function isws(ch: string): boolean {
  return ch === ' ' || ch === '\n' || ch === '\t' || ch === '\f' || ch === '\r';
}

// Returns the next token, or an empty string at the end of the input.
// Returns null if an invalid character is found.
export function nexttoken(input: Input): string | null {
  let ch: string | null = null;
  let token: string = '';

  // Skip whitespace
  while (true) {
    ch = input.get();
    if (ch === null || !isws(ch)) {
      break;
    }
  }

  if (ch !== null) {
    input.unget();
  }

  // Get token
  while (true) {
    ch = input.get();

    if (ch === null || isws(ch)) {
      break;
    }

    if (ch < '!' || ch > '~') {
      console.error('Invalid character read with code ' + ch.charCodeAt(0));
      return null;
    }

    token += ch;
  }

  return token;
}

// Split text into tokens, dropping comments.
export function readtokens(text: string): string[] | null {
  const input = new Input(text);
  const tokens: string[] = [];

  let incomment = false;

  while (true) {
    const token = nexttoken(input);
    if (token === null) {
      return null;
    }
    if (!token.length) {
      break;
    }

    if (incomment) {
      if (token === '$)') {
        incomment = false;
        continue;
      }
      if (token.indexOf('$(') !== -1) {
        console.error('Characters $( found in a comment');
        return null;
      }
      if (token.indexOf('$)') !== -1) {
        console.error('Characters $) found in a comment');
        return null;
      }
      continue;
    }

    // Not in comment
    if (token === '$(') {
      incomment = true;
      continue;
    }

    tokens.push(token);
  }

  if (incomment) {
    console.error('Unclosed comment');
    return null;
  }

  return tokens;
}

function readnumber(tokens: string[], what: string): number | null {
  const token = tokens.shift();
  if (token === undefined) {
    console.error('Expected ' + what + ' but reached the end of the file');
    return null;
  }
  if (!/^[0-9]+$/.test(token)) {
    console.error('Expected ' + what + ' but found ' + token);
    return null;
  }
  return parseInt(token, 10);
}

function readformula(tokens: string[], what: string): Term | null {
  const token = tokens.shift();
  if (token === undefined) {
    console.error('Expected ' + what + ' but reached the end of the file');
    return null;
  }
  const result = parseconcreteterm(token);
  if (!result.ok) {
    console.error('Invalid ' + what + ' ' + token + ': ' + result.message);
    return null;
  }
  return result.term;
}

function readstep(keyword: string, tokens: string[]): InferenceStep | null {
  if (keyword === 'axiom') {
    const index = readnumber(tokens, 'axiom index');
    if (index === null) {
      return null;
    }
    const a = readformula(tokens, 'formula for A');
    if (a === null) {
      return null;
    }
    const b = readformula(tokens, 'formula for B');
    if (b === null) {
      return null;
    }
    const c = readformula(tokens, 'formula for C');
    if (c === null) {
      return null;
    }
    return axiominstantiation(index, a, b, c);
  }

  // It must be modus ponens
  const implicationline = readnumber(tokens, 'implication line');
  if (implicationline === null) {
    return null;
  }
  const premiseline = readnumber(tokens, 'premise line');
  if (premiseline === null) {
    return null;
  }
  return modusponens(implicationline, premiseline);
}

export function readproofs(text: string): ProofEntry[] | null {
  const tokens = readtokens(text);
  if (tokens === null) {
    return null;
  }

  const entries: ProofEntry[] = [];
  let goal: Term | null = null;
  let steps: InferenceStep[] = [];

  const finishproof = (): boolean => {
    if (goal === null) {
      return true;
    }
    const index = entries.length + 1;
    if (!steps.length) {
      console.error('Proof ' + index + ' has no steps');
      return false;
    }
    entries.push({proof: makeproof(goal, steps), index});
    steps = [];
    return true;
  };

  while (tokens.length) {
    const token = tokens.shift();

    if (token === 'goal') {
      if (!finishproof()) {
        return null;
      }
      goal = readformula(tokens, 'goal');
      if (goal === null) {
        return null;
      }
    } else if (token === 'axiom' || token === 'mp') {
      if (goal === null) {
        console.error('Found ' + token + ' before any goal');
        return null;
      }
      const step = readstep(token, tokens);
      if (step === null) {
        return null;
      }
      steps.push(step);
    } else {
      console.error('Unexpected token ' + token + ' encountered');
      return null;
    }
  }

  if (!finishproof()) {
    return null;
  }

  if (!entries.length) {
    console.error('No proofs found');
    return null;
  }

  return entries;
}

export function readprooffile(filename: string): ProofEntry[] | null {
  let text: string;
  try {
    text = fs.readFileSync(filename, {encoding: 'utf8'});
  } catch (e) {
    console.error('Failed to read ' + filename + ': ' + (e instanceof Error ? e.message : String(e)));
    return null;
  }
  return readproofs(text);
}
