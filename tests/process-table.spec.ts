import { describe, it, expect } from 'vitest';
import { OpenCodeAdapter } from '../src/agents/opencode-adapter.js';
import { findAgentProcesses, parseProcessTable, portFromArgs } from '../src/services/process-table.js';

const PS_OUTPUT = [
  '    1 /sbin/init splash',
  '  412 /usr/local/bin/opencode serve --port 4150 --hostname 127.0.0.1 --no-mdns',
  '  413 opencode serve --port=4151',
  '  414 opencode run explain this stack trace',
  '  415 vim opencode-notes.md',
  '',
  'garbage without a pid',
].join('\n');

describe('parseProcessTable', () => {
  it('splits each line into pid and arguments', () => {
    expect(parseProcessTable('  1 /sbin/init splash\n 77 sleep 5\n')).toEqual([
      { pid: 1, argv: ['/sbin/init', 'splash'], cmdline: '/sbin/init splash' },
      { pid: 77, argv: ['sleep', '5'], cmdline: 'sleep 5' },
    ]);
  });

  it('skips lines without a pid', () => {
    expect(parseProcessTable('\ngarbage without a pid\n   \n')).toEqual([]);
  });
});

describe('portFromArgs', () => {
  it('reads --port in both spellings', () => {
    expect(portFromArgs(['opencode', 'serve', '--port', '4150'])).toBe(4150);
    expect(portFromArgs(['opencode', 'serve', '--port=4151'])).toBe(4151);
  });

  it('returns null when the port is missing or out of range', () => {
    expect(portFromArgs(['opencode', 'serve'])).toBeNull();
    expect(portFromArgs(['opencode', 'serve', '--port'])).toBeNull();
    expect(portFromArgs(['opencode', 'serve', '--port=http'])).toBeNull();
    expect(portFromArgs(['opencode', 'serve', '--port', '70000'])).toBeNull();
  });
});

describe('findAgentProcesses', () => {
  it('keeps only agent servers with their ports', async () => {
    const found = await findAgentProcesses(new OpenCodeAdapter(), async () => PS_OUTPUT);

    expect(found).toEqual([
      {
        pid: 412,
        port: 4150,
        cmdline: '/usr/local/bin/opencode serve --port 4150 --hostname 127.0.0.1 --no-mdns',
      },
      { pid: 413, port: 4151, cmdline: 'opencode serve --port=4151' },
    ]);
  });

  it('passes on a failure to read the table', async () => {
    const read = async (): Promise<string> => {
      throw new Error('spawn ps ENOENT');
    };

    await expect(findAgentProcesses(new OpenCodeAdapter(), read)).rejects.toThrow('spawn ps ENOENT');
  });
});
