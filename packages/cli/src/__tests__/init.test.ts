import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

const spinner = vi.hoisted(() => {
  const mock = { start: vi.fn(), succeed: vi.fn(), fail: vi.fn(), warn: vi.fn() };
  mock.start.mockReturnValue(mock);
  return mock;
});

vi.mock('ora', () => ({ default: vi.fn(() => spinner) }));

import { createProgram } from '../program.js';

describe('init', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`exit ${code}`);
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should fail the spinner when the site cannot be created', async () => {
    await expect(
      createProgram().parseAsync(['node', 'pagewright', 'init', '--yes', '--colors', 'neon', '--store', 'memory'])
    ).rejects.toThrow('exit 1');

    expect(spinner.fail).toHaveBeenCalledWith('Could not create site');
    expect(spinner.succeed).not.toHaveBeenCalled();
  });
});
