import { readFileSync, writeFileSync, mkdirSync, existsSync } from 'fs';
import { dirname } from 'path';
import type { FileSet, HealingAttempt, HealingSession } from '../types.js';

export type SessionStatus = 'queued' | 'running' | 'succeeded' | 'exhausted' | 'failed';

export interface HealingRecord {
  id: string;
  status: SessionStatus;
  entryPoint: string;
  maxAttempts: number;
  originalFiles: FileSet;
  currentFiles: FileSet;
  history: HealingAttempt[];
  sandboxId?: string;             // container of the current/last run
  projectDir?: string;            // set when started from the CLI
  error?: string;
  created_at: string;
  started_at?: string;
  finished_at?: string;
}

export interface NewHealingRecord {
  id: string;
  entryPoint: string;
  maxAttempts: number;
  files: FileSet;
  projectDir?: string;
}

export function toHealingSession(record: HealingRecord): HealingSession {
  const success = record.status === 'succeeded';
  return {
    id: record.id,
    entryPoint: record.entryPoint,
    currentFiles: { ...record.currentFiles },
    history: [...record.history],
    maxAttempts: record.maxAttempts,
    success,
    status: success ? 'succeeded' : 'exhausted',
  };
}

export class SessionStore {
  private sessions: Map<string, HealingRecord> = new Map();
  private filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
    this.load();
  }

  private load(): void {
    if (!existsSync(this.filePath)) return;
    const arr: HealingRecord[] = JSON.parse(readFileSync(this.filePath, 'utf-8'));
    for (const s of arr) this.sessions.set(s.id, s);
  }

  private save(): void {
    mkdirSync(dirname(this.filePath), { recursive: true });
    writeFileSync(this.filePath, JSON.stringify([...this.sessions.values()], null, 2));
  }

  create(input: NewHealingRecord): HealingRecord {
    const record: HealingRecord = {
      id: input.id,
      status: 'queued',
      entryPoint: input.entryPoint,
      maxAttempts: input.maxAttempts,
      originalFiles: { ...input.files },
      currentFiles: { ...input.files },
      history: [],
      projectDir: input.projectDir,
      created_at: new Date().toISOString(),
    };
    this.sessions.set(record.id, record);
    this.save();
    return record;
  }

  get(id: string): HealingRecord | undefined {
    return this.sessions.get(id);
  }

  update(id: string, patch: Partial<HealingRecord>): HealingRecord | undefined {
    const record = this.sessions.get(id);
    if (!record) return undefined;
    Object.assign(record, patch);
    this.save();
    return record;
  }

  remove(id: string): boolean {
    const removed = this.sessions.delete(id);
    if (removed) this.save();
    return removed;
  }

  list(): HealingRecord[] {
    return [...this.sessions.values()];
  }
}
