import { type ChalkInstance } from 'chalk';
import stringWidth from 'string-width';
import { CACHE_RELATIVE_PATH, PENDING_TASK_LIMIT } from './constants.js';
import { loadCache } from './load.js';
import { parseSessionCache } from './parse.js';
import { type ReportOptions, type SessionCache } from './types.js';

const LABEL_W = 9; // 'Version: '

const padEndWidth = (s: string, width: number): string => {
  const w = stringWidth(s);
  if (w >= width) return s;
  return s + ' '.repeat(width - w);
};

const field = (label: string, value: string | number | undefined): string[] =>
  value === undefined ? [] : [`  ${padEndWidth(`${label}:`, LABEL_W)}${value}`];

// A section is dropped entirely when none of its fields produced a line.
const section = (header: string, body: string[], style: ChalkInstance): string[] =>
  body.length > 0 ? [style.bold(header), ...body] : [];

const pendingTaskLines = (tasks: string[]): string[] => {
  const lines = tasks.slice(0, PENDING_TASK_LIMIT).map((t, i) => `  ${i + 1}. ${t}`);
  if (tasks.length > PENDING_TASK_LIMIT) {
    lines.push(`  ... and ${tasks.length - PENDING_TASK_LIMIT} more`);
  }
  return lines;
};

export const renderSessionCache = (cache: SessionCache, style: ChalkInstance): string[] => {
  const { project, session, current_phase: phase, pending_tasks: tasks, blockers } = cache;

  const sections = [
    section('Project', [...field('Name', project?.name), ...field('Version', project?.version)], style),
    section('Session', [...field('Count', session?.count), ...field('Last', session?.last_timestamp)], style),
    section('Current phase', [...field('Name', phase?.name), ...field('Status', phase?.status)], style),
    tasks ? section(`Pending tasks (${tasks.length})`, pendingTaskLines(tasks), style) : [],
    blockers ? section(`Blockers (${blockers.length})`, blockers.map((b) => style.yellow(`  ! ${b}`)), style) : [],
  ].filter((lines) => lines.length > 0);

  const out: string[] = [];
  for (const lines of sections) {
    if (out.length) out.push('');
    out.push(...lines);
  }
  if (out.length) out.push('');
  out.push(style.green('Session context loaded.'));
  return out;
};

export async function reportSessionCache({ cwd, style, write }: ReportOptions): Promise<void> {
  const loaded = await loadCache(cwd);

  if (loaded.kind === 'missing') {
    write(`No session cache found at ${CACHE_RELATIVE_PATH}`);
    write(style.dim(`Hint: save your session context to ${CACHE_RELATIVE_PATH} to create it.`));
    return;
  }
  if (loaded.kind === 'read-error') {
    write(style.red(`Error reading session cache: ${loaded.message}`));
    return;
  }

  const parsed = parseSessionCache(loaded.text);
  if (!parsed.ok) {
    write(style.yellow('Warning: session cache could not be parsed as JSON.'));
    return;
  }

  for (const line of renderSessionCache(parsed.cache, style)) {
    write(line);
  }
}
