/**
 * Deterministic Lua-like source generators for scanner benchmarks.
 */

export interface Dataset {
  name: string;
  content: string;
}

const identifiers = ['alpha', 'beta', 'gamma', 'delta', 'count', 'total', 'node', 'item', 'index', 'value'];
const operators = ['+', '-', '*', '/', '..', '==', '~=', '<=', '>='];

/** Generate roughly `targetLength` code points of source from a fixed seed. */
export function generateSource(targetLength: number, seed = 12345): string {
  function next() { seed = (1103515245 * seed + 12345) >>> 0; return seed; }
  function pick<T>(items: readonly T[]): T { return items[next() % items.length]; }

  const lines: string[] = [];
  let length = 0;
  while (length < targetLength) {
    const r = next() % 100;
    let line: string;
    if (r < 10) {
      line = `-- ${pick(identifiers)} ${pick(identifiers)} note`;
    } else if (r < 15) {
      line = `--[[ block ${pick(identifiers)} "quoted ]]" ]]`;
    } else if (r < 35) {
      line = `local ${pick(identifiers)} = "${pick(identifiers)}\\t${next() % 100}"`;
    } else if (r < 50) {
      line = `if ${pick(identifiers)} ${pick(operators)} 0x${(next() % 4096).toString(16)} then return end`;
    } else if (r < 60) {
      line = `function ${pick(identifiers)}_${next() % 50}(a, b) return a ${pick(operators)} b end`;
    } else {
      line = `${pick(identifiers)} = ${pick(identifiers)} ${pick(operators)} ${next() % 1000}.${next() % 100}`;
    }
    lines.push(line);
    length += line.length + 1;
  }
  return lines.join('\n');
}

/** Small, medium and large datasets; generated on each call. */
export function createDatasets(): Dataset[] {
  return [
    { name: 'small', content: generateSource(4 * 1024) },
    { name: 'medium', content: generateSource(256 * 1024) },
    { name: 'large', content: generateSource(2 * 1024 * 1024) },
  ];
}
