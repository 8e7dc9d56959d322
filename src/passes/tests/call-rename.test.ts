import { describe, expect, test } from 'vitest';

import { DEFAULT_CONFIG } from '../../catalogue';
import { callRenamePass, startUnwrapPass } from '..';
import type { PassScenario } from './helpers';
import { applyPass } from './helpers';

describe('call-rename', () => {
  const pass = callRenamePass(DEFAULT_CONFIG.callRename);

  test.for<PassScenario>([
    {
      id: 'qualified',
      description: 'renames cocotb.fork',
      source: 'task = cocotb.fork(monitor(dut))\n',
      expected: 'task = cocotb.start_soon(monitor(dut))\n'
    },
    {
      id: 'bare',
      description: 'qualifies a bare fork while renaming it',
      source: 'fork(monitor(dut))\n',
      expected: 'cocotb.start_soon(monitor(dut))\n'
    },
    {
      id: 'moved',
      description: 'moves BinaryValue to the package root',
      source: 'v = cocotb.binary.BinaryValue(5)\n',
      expected: 'v = cocotb.BinaryValue(5)\n'
    },
    {
      id: 'other-receiver',
      description: 'leaves methods with the same name alone',
      source: 'pool.fork(job)\n',
      expected: 'pool.fork(job)\n'
    },
    {
      id: 'reference',
      description: 'leaves references that are not called alone',
      source: 'spawn = cocotb.fork\n',
      expected: 'spawn = cocotb.fork\n'
    }
  ])('[$id] $description', ({ source, expected }) => {
    expect(applyPass(pass, source).text).toBe(expected);
  });
});

describe('start-unwrap', () => {
  const pass = startUnwrapPass(DEFAULT_CONFIG.startUnwrap);

  test.for<PassScenario>([
    {
      id: 'statement',
      description: 'drops the launcher around clock.start()',
      source: 'cocotb.start_soon(clock.start())\n',
      expected: 'clock.start()\n'
    },
    {
      id: 'assignment',
      description: 'keeps the arguments of start()',
      source: 'task = cocotb.start_soon(Clock(dut.clk, 10).start(start_high=False))\n',
      expected: 'task = Clock(dut.clk, 10).start(start_high=False)\n'
    },
    {
      id: 'launcher-keyword',
      description: 'leaves a launcher with keyword arguments alone',
      source: 'cocotb.start_soon(clock.start(), name="clk")\n',
      expected: 'cocotb.start_soon(clock.start(), name="clk")\n'
    },
    {
      id: 'other-coroutine',
      description: 'leaves other coroutines alone',
      source: 'cocotb.start_soon(monitor(dut))\n',
      expected: 'cocotb.start_soon(monitor(dut))\n'
    }
  ])('[$id] $description', ({ source, expected }) => {
    expect(applyPass(pass, source).text).toBe(expected);
  });
});
