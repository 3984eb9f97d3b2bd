export type CommandParams = Record<string, unknown>;

/**
 * Inbound request shape after parsing. `params` is always populated; an absent
 * or null `params` field on the wire becomes an empty object.
 */
export interface CommandEnvelope {
  type: string;
  params: CommandParams;
}

export interface SuccessResponse {
  status: 'success';
  result: unknown;
}

export interface ErrorResponse {
  status: 'error';
  error: string;
  command: string | null;
  stackTrace?: string;
  receivedText?: string;
}

export type ResponseEnvelope = SuccessResponse | ErrorResponse;

export type EnvelopeParseResult =
  | { outcome: 'parsed'; envelope: CommandEnvelope }
  | { outcome: 'ping' }
  | { outcome: 'emptyType' }
  | { outcome: 'invalid'; reason: string };
