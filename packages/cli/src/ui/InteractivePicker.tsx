/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type React from 'react';
import { render } from 'ink';
import {
  AbortError,
  type ConfirmRequest,
  type InputTextRequest,
  type PickOneRequest,
  type PickOption,
  type Picker,
  type TextValidator,
} from '@experiment-launcher/core';
import { ConfirmDialog } from './components/ConfirmDialog.js';
import { PickOneDialog } from './components/PickOneDialog.js';
import { TextInputDialog } from './components/TextInputDialog.js';

export interface DialogHandle {
  unmount(): void;
}

/** `onExit` fires when the dialog goes away without an answer (Ctrl+C). */
export type DialogRenderer = (
  element: React.ReactElement,
  onExit: () => void,
) => DialogHandle;

const renderWithInk: DialogRenderer = (element, onExit) => {
  const instance = render(element, { exitOnCtrlC: true });
  void instance.waitUntilExit().then(onExit, onExit);
  return instance;
};

/**
 * Resolves each decision by rendering an ink dialog and waiting for the
 * operator. Only one dialog is on screen at a time; Ctrl+C in a dialog
 * rejects with an operator AbortError.
 */
export class InteractivePicker implements Picker {
  readonly kind = 'interactive';
  private queue: Promise<unknown> = Promise.resolve();

  constructor(private readonly renderDialog: DialogRenderer = renderWithInk) {}

  confirm(request: ConfirmRequest): Promise<boolean> {
    return this.ask<boolean>((answer) => (
      <ConfirmDialog
        decisionId={request.id}
        message={request.message}
        defaultValue={request.defaultValue}
        onAnswer={answer}
      />
    ));
  }

  pickOne<T>(request: PickOneRequest<T>): Promise<PickOption<T>> {
    return this.ask<PickOption<T>>((answer) => (
      <PickOneDialog
        decisionId={request.id}
        message={request.message}
        options={request.options}
        onSelect={answer}
      />
    ));
  }

  inputText(request: InputTextRequest, validator?: TextValidator): Promise<string> {
    return this.ask<string>((answer) => (
      <TextInputDialog
        decisionId={request.id}
        message={request.message}
        placeholder={request.placeholder}
        validate={validator}
        onSubmit={answer}
      />
    ));
  }

  private ask<T>(dialog: (answer: (value: T) => void) => React.ReactElement): Promise<T> {
    const next = this.queue.then(
      () =>
        new Promise<T>((resolve, reject) => {
          let settled = false;
          const handle = this.renderDialog(
            dialog((value) => {
              if (settled) {
                return;
              }
              settled = true;
              handle.unmount();
              resolve(value);
            }),
            () => {
              if (settled) {
                return;
              }
              settled = true;
              reject(new AbortError('operator', 'Cancelled by operator.'));
            },
          );
        }),
    );
    this.queue = next.catch(() => undefined);
    return next;
  }
}
