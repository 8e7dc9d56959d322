import { describe, expect, test } from 'vitest';

import { DEFAULT_CONFIG } from '../../catalogue';
import { coroutineMarkerPass } from '..';
import type { PassScenario } from './helpers';
import { applyPass } from './helpers';

const pass = coroutineMarkerPass(DEFAULT_CONFIG.coroutineMarker);

describe('coroutine-marker', () => {
  test.for<PassScenario>([
    {
      id: 'qualified',
      description: 'drops @cocotb.coroutine and makes the def async',
      source: '@cocotb.coroutine\ndef reset(dut):\n    pass\n',
      expected: 'async def reset(dut):\n    pass\n'
    },
    {
      id: 'bare',
      description: 'drops a bare @coroutine',
      source: '@coroutine\ndef reset(dut):\n    pass\n',
      expected: 'async def reset(dut):\n    pass\n'
    },
    {
      id: 'comment',
      description: 'keeps the comment above a dropped decorator',
      source: '# Pulses reset.\n@cocotb.coroutine\ndef reset(dut):\n    pass\n',
      expected: '# Pulses reset.\nasync def reset(dut):\n    pass\n'
    },
    {
      id: 'stacked',
      description: 'keeps unrelated decorators around the dropped one',
      source: '@log\n@cocotb.coroutine\n@traced\ndef step():\n    pass\n',
      expected: '@log\n@traced\nasync def step():\n    pass\n'
    },
    {
      id: 'method',
      description: 'keeps the indentation of a method',
      source: 'class Driver:\n    @cocotb.coroutine\n    def drive(self):\n        pass\n',
      expected: 'class Driver:\n    async def drive(self):\n        pass\n'
    },
    {
      id: 'test-called',
      description: 'makes a @cocotb.test() function async and keeps the decorator',
      source: '@cocotb.test()\ndef test_fifo(dut):\n    pass\n',
      expected: '@cocotb.test()\nasync def test_fifo(dut):\n    pass\n'
    },
    {
      id: 'test-bare',
      description: 'makes a bare @test function async',
      source: '@test\ndef test_fifo(dut): pass\n',
      expected: '@test\nasync def test_fifo(dut): pass\n'
    },
    {
      id: 'test-and-coroutine',
      description: 'drops the legacy marker next to a retained one',
      source: '@cocotb.test()\n@cocotb.coroutine\ndef test_fifo(dut):\n    pass\n',
      expected: '@cocotb.test()\nasync def test_fifo(dut):\n    pass\n'
    },
    {
      id: 'already-async',
      description: 'leaves an async test alone',
      source: '@cocotb.test()\nasync def test_fifo(dut):\n    pass\n',
      expected: '@cocotb.test()\nasync def test_fifo(dut):\n    pass\n'
    },
    {
      id: 'unrelated',
      description: 'leaves other decorators alone',
      source: '@property\ndef width(self):\n    return 8\n',
      expected: '@property\ndef width(self):\n    return 8\n'
    }
  ])('[$id] $description', ({ source, expected }) => {
    const { text, diagnostics } = applyPass(pass, source);
    expect(text).toBe(expected);
    expect(diagnostics).toEqual([]);
  });
});
