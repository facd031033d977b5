import { type ChalkInstance } from 'chalk';

export type SessionCache = {
  project?: {
    name?: string;
    version?: string;
  };
  session?: {
    count?: number;
    last_timestamp?: string; // opaque, printed as-is
  };
  current_phase?: {
    name?: string;
    status?: string;
  };
  pending_tasks?: string[];
  blockers?: string[];
};

export type ParseResult =
  | { ok: true; cache: SessionCache }
  | { ok: false };

export type LoadResult =
  | { kind: 'missing' }
  | { kind: 'read-error'; message: string }
  | { kind: 'loaded'; text: string };

export type ReportOptions = {
  cwd: string;
  style: ChalkInstance;
  write: (line: string) => void;
};
