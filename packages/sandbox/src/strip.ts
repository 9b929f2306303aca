const GUARD_PATTERN = /^if\s*\(\s*require\.main\s*===?\s*module\s*\)/;
const BLOCK_CLOSE_PATTERN = /^\}\s*\)?\s*;?\s*$/;
const INDENTED_PATTERN = /^[ \t]/;

const count = (value: string, character: string): number => value.split(character).length - 1;

/**
 * Whether the guard's body continues past the guard line: a bare guard, or an opening
 * brace left unclosed on that line.
 */
const opensBlock = (guardLine: string): boolean => {
  const rest = guardLine.replace(GUARD_PATTERN, '').trim();
  if (rest === '') {
    return true;
  }
  if (!rest.includes('{')) {
    return false;
  }
  return count(rest, '{') > count(rest, '}');
};

/**
 * Removes a top-level `if (require.main === module)` self-run block so the harness is
 * the only caller of the entry point. Guards nested inside functions are left alone.
 * Lines after the guard are dropped while they are blank or indented; the first
 * unindented line ends the block and is kept, unless it only closes the block. A bare
 * guard may put its opening brace on the next line.
 */
export const stripSelfInvocation = (code: string): string => {
  const kept: string[] = [];
  let skipping = false;
  let awaitingBrace = false;

  for (const line of code.split('\n')) {
    if (GUARD_PATTERN.test(line)) {
      skipping = opensBlock(line);
      awaitingBrace = skipping && line.replace(GUARD_PATTERN, '').trim() === '';
      continue;
    }

    if (skipping) {
      if (line.trim() === '') {
        continue;
      }
      if (awaitingBrace && line.trimStart().startsWith('{')) {
        awaitingBrace = false;
        skipping = count(line, '{') > count(line, '}');
        continue;
      }
      awaitingBrace = false;
      if (INDENTED_PATTERN.test(line)) {
        continue;
      }
      skipping = false;
      if (BLOCK_CLOSE_PATTERN.test(line)) {
        continue;
      }
    }

    kept.push(line);
  }

  return kept.join('\n');
};
