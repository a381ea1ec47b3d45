import { createToken, Lexer, type ILexingError, type IToken, type ITokenConfig, type TokenType } from 'chevrotain';
import { tokenSpecs } from './tokens.js';
import { createLogger } from '../util/logger.js';

const log = createLogger('lexer');

export interface LexResult {
  tokens: IToken[];
  errors: ILexingError[];
}

let cached: Lexer | null = null;

// Built on first use and shared afterwards; chevrotain lexers are stateless
// between tokenize() calls.
function buildLexer(): Lexer {
  if (cached) return cached;
  const allTokens: TokenType[] = tokenSpecs.map(spec => {
    const opt: ITokenConfig = { name: spec.name, pattern: spec.pattern };
    // chevrotain rejects a GROUP key that is present but undefined
    if ('skip' in spec && spec.skip) opt.group = Lexer.SKIPPED;
    return createToken(opt);
  });
  cached = new Lexer(allTokens, { positionTracking: 'onlyOffset' });
  log.debug(`Built lexer with ${allTokens.length} token types`);
  return cached;
}

export function lex(text: string): LexResult {
  const lexResult = buildLexer().tokenize(text);
  return { tokens: lexResult.tokens, errors: lexResult.errors };
}
