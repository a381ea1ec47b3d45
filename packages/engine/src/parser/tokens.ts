// Token specifications for the MML lexer. Order matters: the lexer tries
// patterns top to bottom and takes the first one that matches.

export const tokenSpecs = [
  // skipped
  { name: 'WhiteSpace', pattern: /[ \t\r\n]+/, skip: true },

  // notes and rests: letter, accidental, length digits, dot, tie
  { name: 'Note', pattern: /[A-Ga-g][+#-]?\d*\.?&?/ },
  { name: 'AbsoluteNote', pattern: /[Nn]\d*/ },
  { name: 'Rest', pattern: /[Rr]\d*\.?/ },

  // state
  { name: 'Octave', pattern: /[Oo]\d*/ },
  { name: 'OctaveUp', pattern: />/ },
  { name: 'OctaveDown', pattern: /</ },
  { name: 'Length', pattern: /[Ll]\d*\.?/ },
  { name: 'Tempo', pattern: /[Tt]\d*/ },
  { name: 'Volume', pattern: /[Vv]\d*/ },

  { name: 'Tie', pattern: /&/ },
] as const;

export type TokenSpec = (typeof tokenSpecs)[number];
export type TokenName = TokenSpec['name'];

const tokenNames: ReadonlySet<string> = new Set(tokenSpecs.map(spec => spec.name));

export function isTokenName(name: string): name is TokenName {
  return tokenNames.has(name);
}
