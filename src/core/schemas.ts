/**
 * core/schemas.ts
 *
 * JSON Schemas for the protocol shapes we accept or read back, compiled
 * once with ajv. Each export is a type guard.
 */

import Ajv, { ErrorObject } from 'ajv';
import {
  CallToolParams,
  CallToolResult,
  InitializeResult,
  JsonRpcRequest,
  JsonRpcResponse,
  ListToolsResult
} from './types';

const ajv = new Ajv({ allErrors: true, allowUnionTypes: true });

export const isJsonRpcRequest = ajv.compile<JsonRpcRequest>({
  type: 'object',
  properties: {
    jsonrpc: { type: 'string', const: '2.0' },
    id: { type: ['string', 'number'] },
    method: { type: 'string', minLength: 1 },
    params: { type: 'object' }
  },
  required: ['jsonrpc', 'method']
});

export const isJsonRpcResponse = ajv.compile<JsonRpcResponse>({
  type: 'object',
  properties: {
    jsonrpc: { type: 'string', const: '2.0' },
    id: { type: ['string', 'number', 'null'] },
    error: {
      type: 'object',
      properties: {
        code: { type: 'integer' },
        message: { type: 'string' }
      },
      required: ['code', 'message']
    }
  },
  required: ['jsonrpc', 'id']
});

export const isCallToolParams = ajv.compile<CallToolParams>({
  type: 'object',
  properties: {
    name: { type: 'string', minLength: 1 },
    arguments: { type: 'object' }
  },
  required: ['name']
});

export const isInitializeResult = ajv.compile<InitializeResult>({
  type: 'object',
  properties: {
    protocolVersion: { type: 'string' },
    capabilities: { type: 'object' },
    serverInfo: {
      type: 'object',
      properties: { name: { type: 'string' }, version: { type: 'string' } },
      required: ['name', 'version']
    }
  },
  required: ['protocolVersion', 'capabilities', 'serverInfo']
});

export const isListToolsResult = ajv.compile<ListToolsResult>({
  type: 'object',
  properties: {
    tools: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          name: { type: 'string' },
          description: { type: 'string' },
          inputSchema: { type: 'object' }
        },
        required: ['name', 'inputSchema']
      }
    }
  },
  required: ['tools']
});

export const isCallToolResult = ajv.compile<CallToolResult>({
  type: 'object',
  properties: {
    content: {
      type: 'array',
      items: {
        type: 'object',
        properties: { type: { type: 'string' }, text: { type: 'string' } },
        required: ['type']
      }
    },
    isError: { type: 'boolean' }
  },
  required: ['content']
});

export function describeErrors(errors: ErrorObject[] | null | undefined, dataVar = 'data'): string {
  return ajv.errorsText(errors, { dataVar });
}
