/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { render } from '../../test-utils/render.js';
import { act } from 'react';
import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ConfirmDialog } from './ConfirmDialog.js';
import { RadioButtonSelect } from './shared/RadioButtonSelect.js';

// Mock the child component to make it easier to test the parent
vi.mock('./shared/RadioButtonSelect.js', () => ({
  RadioButtonSelect: vi.fn(() => null),
}));

describe('ConfirmDialog', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should render the question and yes/no options', () => {
    const { lastFrame, unmount } = render(
      <ConfirmDialog
        decisionId="git.reset"
        message="Discard 2 uncommitted change(s)?"
        onAnswer={() => {}}
      />,
    );

    const output = lastFrame();
    expect(output).toContain('Discard 2 uncommitted change(s)?');
    expect(output).toContain('(git.reset)');

    const props = vi.mocked(RadioButtonSelect).mock.calls[0]?.[0];
    expect(props?.items).toEqual([
      { label: 'Yes', value: true, key: 'yes' },
      { label: 'No', value: false, key: 'no' },
    ]);
    // Destructive questions default to "No".
    expect(props?.initialIndex).toBe(1);
    unmount();
  });

  it('should preselect "Yes" when that is the default', () => {
    const { unmount } = render(
      <ConfirmDialog
        decisionId="transfer.confirm"
        message="Copy now?"
        defaultValue={true}
        onAnswer={() => {}}
      />,
    );

    expect(vi.mocked(RadioButtonSelect).mock.calls[0]?.[0].initialIndex).toBe(0);
    unmount();
  });

  it('should call onAnswer with the selected value', () => {
    const onAnswer = vi.fn();
    const { unmount } = render(
      <ConfirmDialog decisionId="git.reset" message="Reset?" onAnswer={onAnswer} />,
    );

    const onSelect = vi.mocked(RadioButtonSelect).mock.calls[0]?.[0].onSelect;
    act(() => {
      onSelect?.(true);
    });

    expect(onAnswer).toHaveBeenCalledWith(true);
    unmount();
  });
});
