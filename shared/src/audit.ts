import { appendFile, readFile } from 'fs/promises';

export type AuditEvent = { ts: string; event: string; [k: string]: unknown };

export interface AuditLog {
  log(event: string, data?: Record<string, unknown>): Promise<void>;
}

export const silentAudit: AuditLog = {
  log: async () => {},
};

/**
 * `[COMPONENT] event {...}` on stdout when `echo` is set, plus one JSON line per
 * event in `file` when given. Callers pass counts and identifiers, never claim
 * values or key material.
 */
export function createAuditLog(opts: { component: string; file?: string; echo?: boolean }): AuditLog {
  const tag = `[${opts.component.toUpperCase()}]`;
  return {
    async log(event, data = {}) {
      if (opts.echo) console.log(tag, event, data);
      if (opts.file) {
        const entry: AuditEvent = { ts: new Date().toISOString(), event, ...data };
        await appendFile(opts.file, JSON.stringify(entry) + '\n');
      }
    },
  };
}

export async function readAuditEvents(file: string, limit = 500): Promise<AuditEvent[]> {
  const txt = await readFile(file, 'utf8').catch((err: NodeJS.ErrnoException) => {
    if (err.code === 'ENOENT') return '';
    throw err;
  });
  const events: AuditEvent[] = [];
  for (const line of txt.trim().split('\n').filter(Boolean)) {
    const parsed: unknown = JSON.parse(line);
    if (typeof parsed === 'object' && parsed !== null && 'ts' in parsed && 'event' in parsed) {
      const { ts, event } = parsed;
      if (typeof ts === 'string' && typeof event === 'string') events.push({ ...parsed, ts, event });
    }
  }
  return events.slice(-limit);
}
