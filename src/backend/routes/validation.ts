import { ZodError, z } from 'zod';
import { parseDayKey, parseLocalIso } from '@shared/time';

export function formatRouteError(error: unknown): string {
  if (error instanceof ZodError) {
    const first = error.issues[0];
    if (!first) return 'Invalid request';
    const path = first.path.length ? first.path.join('.') : 'request';
    return `${path}: ${first.message}`;
  }
  if (error instanceof Error) return error.message;
  return 'Unknown error';
}

export function coerceClampedInt(
  value: unknown,
  fallback: number,
  options: { min?: number; max?: number } = {}
): number {
  const parsed = z.coerce.number().int().safeParse(value);
  if (!parsed.success) return fallback;
  const min = options.min ?? Number.MIN_SAFE_INTEGER;
  const max = options.max ?? Number.MAX_SAFE_INTEGER;
  return Math.min(max, Math.max(min, parsed.data));
}

export function parseOptionalNonEmptyString(value: unknown): string | undefined {
  const schema = z.preprocess(
    (input) => (typeof input === 'string' && input.trim() === '' ? undefined : input),
    z.string().trim().min(1).optional()
  );
  return schema.parse(value);
}

/** `YYYY-MM-DD` (midnight) or a local `YYYY-MM-DDTHH:mm[:ss]` timestamp. */
export const localDateSchema = z.string().trim().transform((value, ctx) => {
  const parsed = parseDayKey(value) ?? parseLocalIso(value);
  if (!parsed) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Expected YYYY-MM-DD or YYYY-MM-DDTHH:mm:ss' });
    return z.NEVER;
  }
  return parsed;
});

const rangeQuerySchema = z.object({
  start: localDateSchema.optional(),
  end: localDateSchema.optional()
});

export type DateRangeQuery = { start?: Date; end?: Date };

export function parseRangeQuery(query: unknown): DateRangeQuery {
  const { start, end } = rangeQuerySchema.parse(query);
  if ((start === undefined) !== (end === undefined)) {
    throw new Error('start and end must be given together');
  }
  return { start, end };
}

export function parseRequiredRangeQuery(query: unknown): { start: Date; end: Date } {
  const { start, end } = parseRangeQuery(query);
  if (!start || !end) {
    throw new Error('start and end are required');
  }
  return { start, end };
}

/** Body of an editor activity report, over HTTP or the event socket. */
export const activityPayloadSchema = z.object({
  filePath: z.string().trim().min(1),
  projectPath: z.string().trim().min(1),
  projectName: z.string().trim().min(1).optional(),
  language: z.string().trim().min(1).optional(),
  timestamp: localDateSchema.optional()
});

export type ActivityPayload = z.infer<typeof activityPayloadSchema>;

export { z };
