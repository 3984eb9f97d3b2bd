import type { ErrorResponse, ResponseEnvelope, SuccessResponse } from './types.ts';

const RECEIVED_TEXT_LIMIT = 50;
const UNKNOWN_COMMAND = 'Unknown';

export const PONG_RESPONSE: SuccessResponse = { status: 'success', result: { message: 'pong' } };

// `undefined` would vanish from the serialized payload, leaving no `result` key.
export function buildSuccessEnvelope(result: unknown): SuccessResponse {
  return { status: 'success', result: result === undefined ? null : result };
}

interface ErrorEnvelopeOptions {
  command?: string | null;
  stackTrace?: string;
}

export function buildErrorEnvelope(message: string, options: ErrorEnvelopeOptions = {}): ErrorResponse {
  const envelope: ErrorResponse = {
    status: 'error',
    error: message,
    command: options.command === undefined ? UNKNOWN_COMMAND : options.command,
  };
  if (options.stackTrace !== undefined) {
    envelope.stackTrace = options.stackTrace;
  }
  return envelope;
}

export function buildInvalidJsonEnvelope(text: string): ErrorResponse {
  return {
    status: 'error',
    error: 'Invalid JSON format',
    command: null,
    receivedText: truncateReceivedText(text),
  };
}

export function truncateReceivedText(text: string): string {
  if (text.length <= RECEIVED_TEXT_LIMIT) {
    return text;
  }
  return `${text.slice(0, RECEIVED_TEXT_LIMIT)}...`;
}

export function serializeResponse(envelope: ResponseEnvelope): string {
  return JSON.stringify(envelope);
}
