import { describe, expect, it } from 'vitest';

import { buildCommand, builtinInterpreters } from './interpreter';

const map = builtinInterpreters('linux', '/usr/bin/node');

describe('builtinInterpreters', () => {
  it('maps common script types', () => {
    expect(map['.js']).toBe('/usr/bin/node');
    expect(map['.py']).toBe('python3');
    expect(map['.sh']).toBe('sh');
    expect(builtinInterpreters('win32', 'node.exe')['.py']).toBe('python');
  });
});

describe('buildCommand', () => {
  it('puts the script after its interpreter, then the pass-through args', () => {
    expect(buildCommand('/s/tool.py', ['-v', 'x'], map)).toEqual({
      command: 'python3',
      args: ['/s/tool.py', '-v', 'x'],
    });
  });

  it('matches extensions case-insensitively', () => {
    expect(buildCommand('/s/TOOL.PY', [], map).command).toBe('python3');
  });

  it('splits interpreter options', () => {
    expect(
      buildCommand('/s/tool.py', ['a'], { '.py': 'python3 -u' }),
    ).toEqual({ command: 'python3', args: ['-u', '/s/tool.py', 'a'] });
  });

  it('executes the file directly when nothing (or nothing usable) is mapped', () => {
    expect(buildCommand('/s/tool', ['a'], map)).toEqual({
      command: '/s/tool',
      args: ['a'],
    });
    expect(buildCommand('/s/tool.sh', [], { '.sh': '  ' })).toEqual({
      command: '/s/tool.sh',
      args: [],
    });
  });
});
