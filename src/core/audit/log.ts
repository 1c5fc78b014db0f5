/**
 * Append-only JSONL record of every decision the runner reports
 */

import path from 'path';
import fs from 'fs-extra';
import type { HookRunReport } from '../hooks/types.js';

export interface AuditEntry extends HookRunReport {
  timestamp: string;
}

export class AuditLog {
  constructor(readonly filePath: string) {}

  async append(report: HookRunReport, now: Date = new Date()): Promise<AuditEntry> {
    const entry: AuditEntry = { timestamp: now.toISOString(), ...report };
    await fs.ensureDir(path.dirname(this.filePath));
    await fs.appendFile(this.filePath, JSON.stringify(entry) + '\n', 'utf-8');
    return entry;
  }
}
