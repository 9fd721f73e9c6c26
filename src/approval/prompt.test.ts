import { describe, it, expect, vi } from 'vitest';
import { PromptApprovalGate } from './prompt.ts';

const GREEN = '\x1b[32m';
const RED = '\x1b[31m';
const DIM = '\x1b[2m';
const RESET = '\x1b[0m';

function setup(...answers: string[]) {
  const ask = vi.fn(async (_question: string) => answers.shift() ?? '');
  const printed: string[] = [];
  const gate = new PromptApprovalGate(ask, text => printed.push(text));
  return { ask, printed, gate };
}

describe('PromptApprovalGate', () => {
  it('approves on y and shows the request first', async () => {
    const { ask, printed, gate } = setup('y');

    await expect(gate.decide('run_command', '⚙️ Run command: `ls`')).resolves.toBe(true);
    expect(ask).toHaveBeenCalledWith('  Approve? (y/n/a=always) ❯ ');
    expect(printed[0]).toContain('Approval required: run_command');
    expect(printed[0]).toContain('⚙️ Run command: `ls`');
    expect(printed[1]).toBe(`${GREEN}  ✅ Approved${RESET}`);
  });

  it('denies anything that is not a yes', async () => {
    const { printed, gate } = setup('nope');
    await expect(gate.decide('write_file', 'x')).resolves.toBe(false);
    expect(printed[1]).toBe(`${RED}  ❌ Denied${RESET}`);
  });

  it('accepts answers in any case with surrounding spaces', async () => {
    const { gate } = setup('  YES ');
    await expect(gate.decide('write_file', 'x')).resolves.toBe(true);
  });

  it('remembers always until reset', async () => {
    const { ask, printed, gate } = setup('a', 'n');

    await expect(gate.decide('edit_file', 'first')).resolves.toBe(true);
    expect(printed[1]).toBe(`${GREEN}  ✅ Auto-approving all future actions.${RESET}`);

    await expect(gate.decide('run_command', 'second')).resolves.toBe(true);
    expect(ask).toHaveBeenCalledTimes(1);
    expect(printed[2]).toBe(`${DIM}[auto-approved] run_command${RESET}`);

    gate.reset();
    await expect(gate.decide('run_command', 'third')).resolves.toBe(false);
    expect(ask).toHaveBeenCalledTimes(2);
  });

  it('denies when the input is closed', async () => {
    const ask = vi.fn(async (_question: string): Promise<string> => {
      throw new Error('input closed');
    });
    const printed: string[] = [];
    const gate = new PromptApprovalGate(ask, text => printed.push(text));

    await expect(gate.decide('write_file', 'x')).resolves.toBe(false);
    expect(printed[1]).toBe(`${RED}  ❌ Denied (input closed)${RESET}`);
  });
});
