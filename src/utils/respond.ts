import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { ErrorPayload } from '../errors.js';

// Unified helpers for MCP JSON responses
export type OkEnvelope<T> = { ok: true; data: T };
export type ErrEnvelope = { ok: false; error: ErrorPayload };
export type Envelope<T> = OkEnvelope<T> | ErrEnvelope;

export function json<T>(envelope: Envelope<T>): CallToolResult {
  const resp: CallToolResult = { content: [{ type: 'text', text: JSON.stringify(envelope, null, 2) }] };
  if (!envelope.ok) resp.isError = true;
  return resp;
}
