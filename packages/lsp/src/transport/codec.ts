import { z } from 'zod';

import { ProtocolViolationError } from '../errors.js';

export type JsonRpcId = number | string;

export interface JsonRpcErrorObject {
  code: number;
  message: string;
  data?: unknown;
}

export type RequestMessage = {
  kind: 'request';
  id: JsonRpcId;
  method: string;
  params?: unknown;
};

export type NotificationMessage = {
  kind: 'notification';
  method: string;
  params?: unknown;
};

export type ResponseMessage = {
  kind: 'response';
  id: JsonRpcId | null;
  result?: unknown;
  error?: JsonRpcErrorObject;
};

export type Message = RequestMessage | NotificationMessage | ResponseMessage;

const idSchema = z.union([z.number().int(), z.string()]);

const errorSchema = z.object({
  code: z.number().int(),
  message: z.string(),
  data: z.unknown().optional(),
});

const requestSchema = z.object({
  id: idSchema,
  method: z.string(),
  params: z.unknown().optional(),
});

const notificationSchema = z.object({
  method: z.string(),
  params: z.unknown().optional(),
});

const responseSchema = z.object({
  id: idSchema.nullable(),
  result: z.unknown().optional(),
  error: errorSchema.optional(),
});

const envelopeSchema = z.object({ jsonrpc: z.literal('2.0') }).passthrough();

/** Serializes a message to its JSON-RPC 2.0 wire form. */
export function encodeMessage(message: Message): Buffer {
  let wire: Record<string, unknown>;
  switch (message.kind) {
    case 'request':
      wire = { jsonrpc: '2.0', id: message.id, method: message.method };
      if (message.params !== undefined) {
        wire.params = message.params;
      }
      break;
    case 'notification':
      wire = { jsonrpc: '2.0', method: message.method };
      if (message.params !== undefined) {
        wire.params = message.params;
      }
      break;
    case 'response':
      wire = { jsonrpc: '2.0', id: message.id };
      if (message.error !== undefined) {
        wire.error = message.error;
      } else {
        wire.result = message.result ?? null;
      }
      break;
  }
  return Buffer.from(JSON.stringify(wire), 'utf8');
}

/**
 * Parses one inbound payload. `method` and `id` decide the shape: both
 * means a server request, `method` alone a notification, `id` alone a
 * response. Anything else is a `ProtocolViolationError`.
 */
export function decodeMessage(payload: Uint8Array): Message {
  const text = Buffer.from(payload).toString('utf8');

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ProtocolViolationError(
      `Malformed JSON payload: ${error instanceof Error ? error.message : String(error)}`,
      text,
    );
  }

  const envelope = envelopeSchema.safeParse(raw);
  if (!envelope.success) {
    throw new ProtocolViolationError('Payload is not a JSON-RPC 2.0 object', raw);
  }
  const body = envelope.data;

  if ('method' in body) {
    if ('id' in body) {
      const request = requestSchema.safeParse(body);
      if (request.success) {
        return { kind: 'request', ...request.data };
      }
    } else {
      const notification = notificationSchema.safeParse(body);
      if (notification.success) {
        return { kind: 'notification', ...notification.data };
      }
    }
  } else if ('id' in body) {
    const response = responseSchema.safeParse(body);
    if (response.success) {
      return { kind: 'response', ...response.data };
    }
  }

  throw new ProtocolViolationError('Message matches no JSON-RPC shape', raw);
}

export function request(id: JsonRpcId, method: string, params?: unknown): RequestMessage {
  return { kind: 'request', id, method, params };
}

export function notification(method: string, params?: unknown): NotificationMessage {
  return { kind: 'notification', method, params };
}

export function successResponse(id: JsonRpcId, result: unknown): ResponseMessage {
  return { kind: 'response', id, result };
}

export function errorResponse(
  id: JsonRpcId,
  code: number,
  message: string,
  data?: unknown,
): ResponseMessage {
  return {
    kind: 'response',
    id,
    error: data === undefined ? { code, message } : { code, message, data },
  };
}
