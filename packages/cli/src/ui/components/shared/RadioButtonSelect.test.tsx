/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect, vi } from 'vitest';
import { render, waitForInput } from '../../../test-utils/render.js';
import { RadioButtonSelect } from './RadioButtonSelect.js';

const items = [
  { label: 'reversal', value: 'reversal', key: 'reversal', description: 'run-task' },
  { label: 'probe', value: 'probe', key: 'probe' },
  { label: 'habituation', value: 'habituation', key: 'habituation' },
];

describe('RadioButtonSelect', () => {
  it('marks the initial item and shows descriptions', () => {
    const { lastFrame, unmount } = render(
      <RadioButtonSelect items={items} initialIndex={1} onSelect={() => {}} />,
    );

    const lines = (lastFrame() ?? '').split('\n');
    expect(lines[0]).toContain('○');
    expect(lines[0]).toContain('reversal');
    expect(lines[1]).toContain('run-task');
    expect(lines[2]).toContain('●');
    expect(lines[2]).toContain('probe');
    unmount();
  });

  it('moves with the arrow keys and selects on enter', async () => {
    const onSelect = vi.fn();
    const { stdin, unmount } = render(
      <RadioButtonSelect items={items} onSelect={onSelect} />,
    );
    await waitForInput();

    stdin.write('\u001B[B');
    await waitForInput();
    stdin.write('\u001B[B');
    await waitForInput();
    stdin.write('\r');
    await waitForInput();

    expect(onSelect).toHaveBeenCalledWith('habituation');
    unmount();
  });

  it('wraps around when moving up from the first item', async () => {
    const onSelect = vi.fn();
    const { stdin, unmount } = render(
      <RadioButtonSelect items={items} onSelect={onSelect} />,
    );
    await waitForInput();

    stdin.write('k');
    await waitForInput();
    stdin.write('\r');
    await waitForInput();

    expect(onSelect).toHaveBeenCalledWith('habituation');
    unmount();
  });

  it('selects an item by its number', async () => {
    const onSelect = vi.fn();
    const { stdin, unmount } = render(
      <RadioButtonSelect items={items} onSelect={onSelect} />,
    );
    await waitForInput();

    stdin.write('2');
    await waitForInput();

    expect(onSelect).toHaveBeenCalledWith('probe');
    unmount();
  });
});
