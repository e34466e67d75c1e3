import { describe, expect, it } from 'vitest';

import { resolveExecArgv } from '@/workers/launcher.js';

describe('resolveExecArgv', () => {
  it('adds the tsx loader for a TypeScript entry', () => {
    expect(resolveExecArgv('/app/src/workers/worker-entry.ts', ['--enable-source-maps'])).toEqual([
      '--enable-source-maps',
      '--import',
      'tsx',
    ]);
  });

  it('keeps a loader that is already there', () => {
    expect(resolveExecArgv('/app/src/workers/worker-entry.ts', ['--import', 'tsx'])).toEqual(['--import', 'tsx']);
    expect(resolveExecArgv('/app/src/workers/worker-entry.ts', ['--import=tsx/esm'])).toEqual(['--import=tsx/esm']);
  });

  it('leaves compiled entries alone', () => {
    expect(resolveExecArgv('/app/dist/workers/worker-entry.js', [])).toEqual([]);
  });
});
