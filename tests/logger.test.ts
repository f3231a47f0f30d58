import { afterEach, describe, expect, it, vi } from 'vitest';
import { stderrLogger } from '../src/core/logger.js';

describe('stderrLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('keeps log lines off stdout', () => {
    const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const stdout = vi.spyOn(process.stdout, 'write');
    stderrLogger('info').info({ path: 'out' }, 'saved mined table');

    expect(stdout).not.toHaveBeenCalled();
    expect(stderr).toHaveBeenCalledTimes(1);
    const line: unknown = JSON.parse(String(stderr.mock.calls[0][0]));
    expect(line).toMatchObject({ level: 30, name: 'nodepack', msg: 'saved mined table', path: 'out' });
  });

  it('filters by level', () => {
    const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    stderrLogger('warn').info('not shown');
    expect(stderr).not.toHaveBeenCalled();
  });
});
