/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  summarizeLedger,
  type Ledger,
  type ResumeResult,
  type SessionResult,
} from '@experiment-launcher/core';

function transferLine(ledger: Ledger): string {
  const summary = summarizeLedger(ledger);
  return `Transfer: ${summary.confirmed}/${summary.total} file(s) confirmed, ${summary.failed} failed, notification ${ledger.notification.state}`;
}

export function formatSessionSummary(result: SessionResult): string[] {
  const lines = [
    `Session ${result.session.id} ended ${result.finalStage}`,
    `Directory: ${result.session.directory}`,
    `Manifest: ${result.manifestPath}`,
  ];
  if (result.ledger) {
    lines.push(transferLine(result.ledger));
  }
  if (result.abortReason) {
    lines.push(`Aborted by: ${result.abortReason}`);
  }
  if (result.error) {
    const where = result.error.stage ? ` in ${result.error.stage}` : '';
    lines.push(`Error (${result.error.kind})${where}: ${result.error.message}`);
  }
  return lines;
}

export function formatResumeSummary(result: ResumeResult): string[] {
  const lines = [
    `Resumed transfer for session ${result.sessionId} ended ${result.finalStage}`,
    `Manifest: ${result.manifestPath}`,
    transferLine(result.ledger),
  ];
  if (result.requeued.length > 0) {
    lines.push(`Re-queued: ${result.requeued.join(', ')}`);
  }
  if (result.aborted) {
    lines.push('Aborted before the transfer finished.');
  }
  return lines;
}
