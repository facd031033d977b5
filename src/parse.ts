import { z } from 'zod';
import { type ParseResult, type SessionCache } from './types.js';

// Every field falls back to absent on a type mismatch instead of failing the document.
const optionalString = z.string().optional().catch(undefined);

const stringList = z
  .array(z.unknown())
  .transform((items) => {
    const strings = items.filter((it): it is string => typeof it === 'string');
    return strings.length > 0 ? strings : undefined;
  })
  .optional()
  .catch(undefined);

const section = <T extends z.ZodRawShape>(shape: T) => z.object(shape).optional().catch(undefined);

const sessionCacheSchema = z
  .object({
    project: section({
      name: optionalString,
      version: optionalString,
    }),
    session: section({
      count: z.number().int().nonnegative().optional().catch(undefined),
      last_timestamp: optionalString,
    }),
    current_phase: section({
      name: optionalString,
      status: optionalString,
    }),
    pending_tasks: stringList,
    blockers: stringList,
  })
  .catch({});

export const parseSessionCache = (text: string): ParseResult => {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    // invalid JSON is reported as a whole; nothing is extracted from it
    return { ok: false };
  }
  const cache: SessionCache = sessionCacheSchema.parse(raw);
  return { ok: true, cache };
};
