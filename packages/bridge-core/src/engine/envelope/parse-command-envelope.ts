import { z } from 'zod';
import { isPingCommand } from './is-ping-command.ts';
import type { EnvelopeParseResult } from './types.ts';

const RawEnvelopeSchema = z.object({
  type: z.string().nullish(),
  params: z.record(z.unknown()).nullish(),
});

export function parseCommandEnvelope(text: string): EnvelopeParseResult {
  const raw: unknown = JSON.parse(text);
  const parsed = RawEnvelopeSchema.safeParse(raw);

  if (!parsed.success) {
    return { outcome: 'invalid', reason: formatIssues(parsed.error) };
  }

  const type = parsed.data.type ?? '';
  if (type.trim() === '') {
    return { outcome: 'emptyType' };
  }

  if (isPingCommand(type)) {
    return { outcome: 'ping' };
  }

  return {
    outcome: 'parsed',
    envelope: { type, params: parsed.data.params ?? {} },
  };
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join('.');
      return path === '' ? issue.message : `${path}: ${issue.message}`;
    })
    .join('; ');
}
